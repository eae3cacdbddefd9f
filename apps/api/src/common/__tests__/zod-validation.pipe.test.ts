import { describe, it, expect } from 'vitest';
import { UnprocessableEntityException } from '@nestjs/common';
import { reportRequestSchema } from '@tabula/shared';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';

describe('ZodValidationPipe', () => {
  const pipe = new ZodValidationPipe(reportRequestSchema);

  it('returns the parsed value with defaults applied', () => {
    const parsed = pipe.transform({ sections: [{ data: { A: [1] } }] });
    const [section] = parsed.sections;
    expect(section?.data.get('A')).toEqual(['1']);
    expect(section?.showHeader).toBe(true);
    expect(section?.summaryItems).toEqual([]);
  });

  it('throws 422 with issue paths', () => {
    let caught: unknown;
    try {
      pipe.transform({ sections: [{ data: { A: [1] }, style: { borderWidth: 'wide' } }] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(UnprocessableEntityException);
    if (!(caught instanceof UnprocessableEntityException)) return;
    expect(caught.getResponse()).toEqual({
      error: 'VALIDATION_ERROR',
      message: 'Request validation failed',
      details: [{ path: 'sections.0.style.borderWidth', message: 'Expected number, received string' }],
    });
  });
});
