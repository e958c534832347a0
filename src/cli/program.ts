import { Command, CommanderError } from 'commander';
import { AzureADClient, DirectoryClient } from '../config/azure';
import { ConfigurationService } from '../config/config.service';
import { AzureCredentials, SETTING_DESCRIPTORS } from '../config/types';
import { SecretMonitorService } from '../services/secret-monitor.service';
import { ExportService, exportService } from '../services/export.service';
import { formatErrorChain } from '../services/base/errors';
import { logger } from '../utils/logger';

export const PROGRAM_NAME = 'secret-expiry-monitor';
export const PROGRAM_VERSION = '1.0.0';

// Option values as commander stores them; every flag takes a string argument
export type CliOptions = {
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
  monitorTag?: string;
  expiryThresholdDays?: string;
  format?: string;
  config?: string;
};

/**
 * Seams for tests; production wiring uses the defaults
 */
export interface CliDependencies {
  configService?: ConfigurationService;
  createClient?: (credentials: AzureCredentials) => DirectoryClient;
  exportService?: ExportService;
  now?: () => Date;
  writeOut?: (text: string) => void;
  writeErr?: (text: string) => void;
}

export function createProgram(deps: CliDependencies = {}): Command {
  const configService = deps.configService ?? new ConfigurationService();
  const createClient = deps.createClient ?? ((credentials: AzureCredentials) => new AzureADClient(credentials));
  const exporter = deps.exportService ?? exportService;
  const now = deps.now ?? (() => new Date());
  const writeOut = deps.writeOut ?? ((text: string) => process.stdout.write(text));
  const writeErr = deps.writeErr ?? ((text: string) => process.stderr.write(text));

  const program = new Command();

  program
    .name(PROGRAM_NAME)
    .description('Report Azure AD application secrets that are about to expire')
    .version(PROGRAM_VERSION)
    .option(`${SETTING_DESCRIPTORS.tenantId.flag} <id>`, 'Azure AD tenant ID')
    .option(`${SETTING_DESCRIPTORS.clientId.flag} <id>`, 'Application (client) ID used to sign in')
    .option(`${SETTING_DESCRIPTORS.clientSecret.flag} <secret>`, 'Client secret used to sign in')
    .option(`${SETTING_DESCRIPTORS.monitorTag.flag} <tag>`, 'Regular expression matched against application tags; of the inline flags only a leading (?i), (?m) or (?s) is supported (default: "MonitorSecrets")')
    .option(`${SETTING_DESCRIPTORS.expiryThresholdDays.flag} <days>`, 'Report secrets expiring within this many days (default: 30)')
    .option(`${SETTING_DESCRIPTORS.format.flag} <format>`, 'Output format: text or json (default: "text")')
    .option('--config <path>', 'Path to a JSON config file (default: ./config.json when present)')
    .configureOutput({ writeOut, writeErr })
    .exitOverride()
    .action(async () => {
      const { config, ...flags } = program.opts<CliOptions>();
      const settings = configService.resolve(flags, config);

      const startedAt = now();
      const monitor = new SecretMonitorService(createClient(settings), settings);
      const results = await monitor.checkSecrets(startedAt);

      writeOut(exporter.render(results, settings, startedAt));
    });

  return program;
}

/**
 * Parse `argv` (without the node and script entries), run one monitoring pass
 * and resolve to the process exit code.
 */
export async function run(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const writeErr = deps.writeErr ?? ((text: string) => process.stderr.write(text));
  const program = createProgram({ ...deps, writeErr });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    // commander has already printed usage errors, help and version output
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    logger.debug('Secret monitor run failed', { error: formatErrorChain(error) });
    writeErr(`Error: ${formatErrorChain(error)}\n`);
    return 1;
  }
}
