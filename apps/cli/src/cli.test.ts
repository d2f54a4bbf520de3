import type { InvoiceAuditReport } from '@invoice-audit/model';

import { writeFile } from 'node:fs/promises';
import { type Mock, beforeEach, describe, expect, test, vi } from 'vitest';

import { type CliContext, runCli } from './cli';

vi.mock('node:fs/promises', () => ({
  writeFile: vi.fn(),
}));

const mockWriteFile = writeFile as Mock;

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const REPORT: InvoiceAuditReport = {
  output: {
    invoice_number: '15',
    date: '2024-03-10',
    supplier: 'ООО Ромашка',
    buyer: 'АО Лютик',
    amount: 100,
    vat: 20,
    vat_rate: 20,
    contract_number: null,
    payment_date: null,
    meter_number: null,
  },
  pages: [{ pageNo: 1, method: 'embedded', charCount: 120 }],
  attempts: 1,
  recoveryTier: 'strict',
  validation: { missingFields: [], vatMismatch: null, isConsistent: true },
  unsetFields: ['contract_number', 'payment_date', 'meter_number'],
};

describe('runCli', () => {
  let audit: Mock;
  let print: Mock;
  let checkEnvironment: Mock;
  let createAuditor: Mock;
  let context: CliContext;

  beforeEach(() => {
    vi.clearAllMocks();
    mockWriteFile.mockResolvedValue(undefined);
    audit = vi.fn().mockResolvedValue(REPORT);
    print = vi.fn();
    checkEnvironment = vi.fn().mockResolvedValue({ ok: true, problems: [] });
    createAuditor = vi.fn().mockResolvedValue({ audit });
    context = {
      env: { GIGACHAT_AUTH_KEY: 'test-secret' },
      cwd: '/work',
      print,
      createLogger: () => mockLogger,
      checkEnvironment,
      createAuditor,
    };
  });

  test('audits the given document, prints and saves the result', async () => {
    const code = await runCli(['invoices/march.pdf'], context);

    expect(code).toBe(0);
    expect(audit).toHaveBeenCalledWith('/work/invoices/march.pdf');
    expect(print).toHaveBeenCalledWith(JSON.stringify(REPORT.output, null, 2));
    expect(mockWriteFile).toHaveBeenCalledWith(
      '/work/march_audit_result.json',
      JSON.stringify(REPORT.output, null, 2) + '\n',
      'utf8',
    );
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[InvoiceAuditCli] Result saved to /work/march_audit_result.json',
    );
  });

  test('falls back to PDF_FILE and its default', async () => {
    await runCli([], context);
    expect(audit).toHaveBeenCalledWith('/work/счет-фактура.pdf');

    await runCli([], {
      ...context,
      env: { GIGACHAT_AUTH_KEY: 'test-secret', PDF_FILE: '/data/april.pdf' },
    });
    expect(audit).toHaveBeenLastCalledWith('/data/april.pdf');
  });

  test('passes the configuration to its collaborators', async () => {
    await runCli(['a.pdf'], {
      ...context,
      env: { GIGACHAT_AUTH_KEY: 'test-secret', OCR_LANGUAGES: 'ukr+eng' },
    });

    expect(checkEnvironment.mock.calls[0][0]).toMatchObject({
      ocrLanguages: ['ukr', 'eng'],
    });
    expect(createAuditor.mock.calls[0][0]).toMatchObject({
      authKey: 'test-secret',
    });
  });

  test('fails on invalid configuration', async () => {
    const consoleError = vi
      .spyOn(console, 'error')
      .mockImplementation(() => undefined);

    const code = await runCli(['a.pdf'], { ...context, env: {} });

    expect(code).toBe(1);
    expect(consoleError).toHaveBeenCalledWith(
      '[InvoiceAuditCli] Invalid configuration:\n- GIGACHAT_AUTH_KEY: Required',
    );
    expect(createAuditor).not.toHaveBeenCalled();
    consoleError.mockRestore();
  });

  test('refuses to run when required tools are missing', async () => {
    checkEnvironment.mockResolvedValue({
      ok: false,
      problems: ['tesseract is not installed'],
    });

    const code = await runCli(['a.pdf'], context);

    expect(code).toBe(1);
    expect(mockLogger.error).toHaveBeenCalledWith(
      '[InvoiceAuditCli] Environment check failed: tesseract is not installed',
    );
    expect(createAuditor).not.toHaveBeenCalled();
  });

  test('exits with 1 when the audit fails', async () => {
    audit.mockRejectedValue(new Error('Document not found: /work/a.pdf'));

    const code = await runCli(['a.pdf'], context);

    expect(code).toBe(1);
    expect(mockLogger.error).toHaveBeenCalledWith(
      '[InvoiceAuditCli] Audit failed:',
      'Document not found: /work/a.pdf',
    );
    expect(mockWriteFile).not.toHaveBeenCalled();
  });

  test('saves a diagnostic failure and exits with 0', async () => {
    audit.mockResolvedValue({
      ...REPORT,
      output: {
        error: 'JSON parse failed',
        raw_response: 'нет',
        extracted_text: 'Счет',
      },
      recoveryTier: null,
      validation: null,
      unsetFields: [],
    });

    const code = await runCli(['a.pdf'], context);

    expect(code).toBe(0);
    expect(mockWriteFile).toHaveBeenCalledTimes(1);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[InvoiceAuditCli] No record could be recovered; the raw reply was saved for inspection',
    );
  });
});
