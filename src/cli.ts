import { PncpClient } from './clients/PncpClient.js';
import { EXIT_CODES, type ExitCode } from './config/constants.js';
import { type AppConfig, loadConfig } from './config/env.js';
import { exitCodeFor, type NoticeSource, runPipeline } from './services/PipelineOrchestrator.js';
import { type IEmailService, NodemailerEmailService } from './services/infrastructure/EmailService.js';
import { ConfigurationError } from './types/errors.js';
import { describeError } from './utils/errorSanitizer.js';
import { createChildLogger } from './utils/logger.js';

const log = createChildLogger({ component: 'cli' });

export interface CliOverrides {
  createSource?: (config: AppConfig) => NoticeSource;
  createEmailService?: (config: AppConfig) => IEmailService;
  now?: () => Date;
}

/**
 * Run the digest once and return the process exit status
 */
export async function main(env: NodeJS.ProcessEnv = process.env, overrides: CliOverrides = {}): Promise<ExitCode> {
  const now = overrides.now ?? (() => new Date());

  let config: AppConfig;
  try {
    config = loadConfig(env, now());
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error({ issues: error.issues }, 'Configuration error; nothing was fetched or sent');
      return EXIT_CODES.CONFIGURATION_ERROR;
    }
    throw error;
  }

  const source = overrides.createSource?.(config) ?? new PncpClient(config.pncp);
  const emailService = overrides.createEmailService?.(config) ?? new NodemailerEmailService(config.email);

  try {
    const outcome = await runPipeline(config, { source, emailService, now });
    const exitCode = exitCodeFor(outcome);
    if (exitCode === EXIT_CODES.SUCCESS) {
      log.info({ outcome, exitCode }, 'PNCP digest run finished');
    } else {
      log.error({ outcome, exitCode }, 'PNCP digest run failed');
    }
    return exitCode;
  } catch (error) {
    log.fatal({ error: describeError(error, [config.email.senderCredential]) }, 'Unexpected error during PNCP digest run');
    return EXIT_CODES.UNEXPECTED_ERROR;
  }
}
