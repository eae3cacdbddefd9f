import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';
import { ResponseTransformInterceptor } from './common/interceptors/response-transform.interceptor';

/** Filters, interceptors and plain routes shared by the server and its tests */
export function configureApp(app: NestFastifyApplication): void {
  app.useGlobalFilters(new GlobalExceptionFilter());
  app.useGlobalInterceptors(new ResponseTransformInterceptor());

  // Health endpoint for Docker healthchecks
  const fastifyInstance = app.getHttpAdapter().getInstance();
  fastifyInstance.get('/api/health', (_req: unknown, reply: { send: (body: unknown) => void }) => {
    reply.send({ status: 'ok' });
  });
}
