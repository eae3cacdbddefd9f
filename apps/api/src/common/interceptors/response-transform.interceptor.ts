import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable, map } from 'rxjs';

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

/**
 * Wraps JSON handler results in `{ success, data }`. Handlers that write the
 * reply themselves (report downloads) return nothing and are left alone.
 */
@Injectable()
export class ResponseTransformInterceptor<T>
  implements NestInterceptor<T, SuccessResponse<T> | undefined>
{
  intercept(
    _context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<SuccessResponse<T> | undefined> {
    return next.handle().pipe(
      map((data) => (data === undefined ? undefined : { success: true as const, data })),
    );
  }
}
