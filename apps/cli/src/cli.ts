import type { InvoiceAuditReport } from '@invoice-audit/model';
import type { ToolEnvironmentReport } from '@invoice-audit/pdf-parser';

import type { AppConfig } from './config';

import { InvoiceAuditor } from '@invoice-audit/document-processor';
import { type LoggerMethods, createConsoleLogger } from '@invoice-audit/logger';
import { isDiagnosticFailure } from '@invoice-audit/model';
import { DocumentTextAcquirer, ToolEnvironment } from '@invoice-audit/pdf-parser';
import { ChatCompletionApi, CredentialBroker } from '@invoice-audit/shared';
import { resolve } from 'node:path';

import { ConfigError, loadConfig } from './config';
import { formatAuditOutput, writeAuditResult } from './output';

/**
 * Anything that audits a document
 */
export interface Auditor {
  audit(pdfPath: string): Promise<InvoiceAuditReport>;
}

/**
 * Process context and collaborators of a CLI run
 */
export interface CliContext {
  env: Record<string, string | undefined>;

  /** Working directory; relative paths and the result file resolve here */
  cwd: string;

  /** Receives the formatted result (default: console.log) */
  print?: (text: string) => void;

  createLogger?: (config: AppConfig) => LoggerMethods;
  checkEnvironment?: (
    config: AppConfig,
    logger: LoggerMethods,
  ) => Promise<ToolEnvironmentReport>;
  createAuditor?: (config: AppConfig, logger: LoggerMethods) => Promise<Auditor>;
}

function defaultCheckEnvironment(
  config: AppConfig,
  logger: LoggerMethods,
): Promise<ToolEnvironmentReport> {
  return new ToolEnvironment({
    logger,
    ocrLanguages: config.ocrLanguages,
  }).check();
}

async function defaultCreateAuditor(
  config: AppConfig,
  logger: LoggerMethods,
): Promise<Auditor> {
  const credentials = new CredentialBroker({
    logger,
    authKey: config.authKey,
    scope: config.scope,
    authUrl: config.authUrl,
  });
  const completion = new ChatCompletionApi({
    logger,
    credentials,
    apiUrl: config.apiUrl,
    model: config.model,
  });
  const acquirer = await DocumentTextAcquirer.create({
    logger,
    ocrLanguages: config.ocrLanguages,
  });

  return new InvoiceAuditor({ logger, acquirer, completion });
}

function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run one audit from command-line arguments.
 *
 * Usage: `invoice-audit [pdf]`. Without an argument the document named by
 * PDF_FILE is audited. The output JSON is printed and saved as
 * `<stem>_audit_result.json` in the working directory.
 *
 * @returns process exit code: 0 when an output was written, 1 otherwise
 */
export async function runCli(
  args: string[],
  context: CliContext,
): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(context.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      createConsoleLogger('error').error(`[InvoiceAuditCli] ${error.message}`);
      return 1;
    }
    throw error;
  }

  const logger = context.createLogger
    ? context.createLogger(config)
    : createConsoleLogger(config.logLevel);
  const print = context.print ?? ((text: string) => console.log(text));
  const pdfPath = resolve(context.cwd, args[0] ?? config.pdfFile);

  try {
    const environment = await (
      context.checkEnvironment ?? defaultCheckEnvironment
    )(config, logger);
    if (!environment.ok) {
      logger.error(
        `[InvoiceAuditCli] Environment check failed: ${environment.problems.join('; ')}`,
      );
      return 1;
    }

    const auditor = await (context.createAuditor ?? defaultCreateAuditor)(
      config,
      logger,
    );
    const report = await auditor.audit(pdfPath);

    print(formatAuditOutput(report.output));
    const outputPath = await writeAuditResult(
      report.output,
      pdfPath,
      context.cwd,
    );
    logger.info(`[InvoiceAuditCli] Result saved to ${outputPath}`);

    if (isDiagnosticFailure(report.output)) {
      logger.warn(
        '[InvoiceAuditCli] No record could be recovered; the raw reply was saved for inspection',
      );
    }
    return 0;
  } catch (error) {
    logger.error('[InvoiceAuditCli] Audit failed:', getErrorMessage(error));
    return 1;
  }
}
