import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { Test } from '@nestjs/testing';
import { FastifyAdapter, type NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppModule } from '../../../app.module';
import { configureApp } from '../../../app.setup';

describe('ReportController', () => {
  let app: NestFastifyApplication;

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] }).compile();
    app = moduleRef.createNestApplication<NestFastifyApplication>(new FastifyAdapter());
    configureApp(app);
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('answers the health check', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('lists formats inside the success envelope', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/reports/formats' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      success: true,
      data: [
        { name: 'txt', defaultFileExtension: '.txt', contentType: 'text/plain; charset=utf-8', supportsFormatting: false },
        { name: 'html', defaultFileExtension: '.html', contentType: 'text/html; charset=utf-8', supportsFormatting: true },
        {
          name: 'markdown',
          defaultFileExtension: '.md',
          contentType: 'text/markdown; charset=utf-8',
          supportsFormatting: true,
        },
        { name: 'pdf', defaultFileExtension: '.pdf', contentType: 'application/pdf', supportsFormatting: true },
      ],
    });
  });

  it('returns the rendered report as a download', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/reports/txt',
      payload: {
        sections: [
          {
            title: 'Scores',
            showRowNumbers: true,
            data: { Name: ['Ann', 'Bob'], Score: [10, 20] },
            summaryItems: [{ label: 'Total', calcType: 'SUM', columnName: 'Score' }],
          },
        ],
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
    expect(res.headers['content-disposition']).toBe('attachment; filename="report.txt"');
    expect(res.payload).toBe(
      'Scores\n#  Name  Score\n-  ----  -----\n1  Ann   10   \n2  Bob   20   \n\nTotal: 30\n',
    );
  });

  it('renders one section from CSV text', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/reports/markdown/csv',
      payload: { csv: 'A;B\n1;2\n', delimiter: ';', section: { title: 'T' } },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-disposition']).toBe('attachment; filename="report.md"');
    expect(res.payload).toBe('## T\n\n| A | B |\n| --- | --- |\n| 1 | 2 |\n');
  });

  it('maps an unknown format to 404', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/reports/docx',
      payload: { sections: [{ data: { A: ['1'] } }] },
    });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({
      success: false,
      error: {
        code: 'RENDERER_NOT_FOUND',
        message: 'No renderer for format "docx" (available: txt, html, markdown, pdf)',
      },
    });
  });

  it('maps an invalid section to 422', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/reports/html',
      payload: {
        sections: [{ title: 'Q', data: { A: ['1'] }, summaryItems: [{ label: 'S', calcType: 'SUM', columnName: 'B' }] }],
      },
    });

    expect(res.statusCode).toBe(422);
    expect(res.json()).toEqual({
      success: false,
      error: {
        code: 'REPORT_VALIDATION_ERROR',
        message: 'Section "Q" is invalid: summary item "S" refers to unknown column "B"',
      },
    });
  });

  it('rejects a malformed body before rendering', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/reports/txt', payload: { sections: [] } });

    expect(res.statusCode).toBe(422);
    const body = res.json<{ success: boolean; error: { code: string; details: { path: string }[] } }>();
    expect(body.success).toBe(false);
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.details.map((d) => d.path)).toEqual(['sections']);
  });
});
