import fs from 'fs';
import path from 'path';
import {
  ConfigIssue,
  ConfigValidationResult,
  DEFAULT_CONFIG_FILE,
  DEFAULT_SETTINGS,
  OUTPUT_FORMATS,
  OutputFormat,
  RunSettings,
  SETTING_DESCRIPTORS,
  SettingKey,
  SettingsInput
} from './types';
import { ConfigurationError, ValidationError, toError } from '../services/base/errors';
import { logger } from '../utils/logger';

const SETTING_KEYS: readonly SettingKey[] = [
  'tenantId',
  'clientId',
  'clientSecret',
  'monitorTag',
  'expiryThresholdDays',
  'format'
];

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Resolves run settings from defaults, config file, environment and CLI flags.
 * Precedence: flags > environment > config file > defaults.
 */
export class ConfigurationService {
  constructor(
    private readonly env: NodeJS.ProcessEnv = process.env,
    private readonly cwd: string = process.cwd()
  ) {}

  /**
   * Merge every source and validate the result.
   * Throws ValidationError or ConfigurationError before any network access happens.
   */
  resolve(flags: SettingsInput = {}, configPath?: string): RunSettings {
    const merged: SettingsInput = {
      ...DEFAULT_SETTINGS,
      ...withoutUndefined(this.loadConfigFile(configPath)),
      ...withoutUndefined(this.loadEnvironment()),
      ...withoutUndefined(flags)
    };

    const result = this.validateConfiguration(merged);
    if (!result.isValid || !result.settings) {
      const [first] = result.errors;
      if (result.errors.length > 1) {
        logger.debug('Configuration validation errors: %s', result.errors.map(e => e.message).join('; '));
      }
      throw new ValidationError(first?.message ?? 'invalid configuration', first?.field);
    }

    logger.debug('Configuration resolved', {
      monitorTag: result.settings.monitorTag,
      expiryThresholdDays: result.settings.expiryThresholdDays,
      format: result.settings.format
    });

    return result.settings;
  }

  /**
   * Read settings from AZURE_* environment variables. Empty values count as unset.
   */
  loadEnvironment(): SettingsInput {
    const settings: SettingsInput = {};
    for (const key of SETTING_KEYS) {
      const value = this.env[SETTING_DESCRIPTORS[key].envVar];
      if (value !== undefined && value !== '') {
        settings[key] = value;
      }
    }
    return settings;
  }

  /**
   * Read a JSON config file with snake_case keys.
   * An explicit path must exist; the default ./config.json is optional.
   */
  loadConfigFile(configPath?: string): SettingsInput {
    const explicit = configPath !== undefined && configPath !== '';
    const filePath = path.resolve(this.cwd, explicit ? configPath : DEFAULT_CONFIG_FILE);

    if (!explicit && !fs.existsSync(filePath)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`error reading config file ${filePath}`, toError(error));
    }

    if (!isPlainObject(raw)) {
      throw new ConfigurationError(`error reading config file ${filePath}: expected a JSON object`);
    }

    logger.debug('Using config file %s', filePath);
    return parseConfigObject(raw, filePath);
  }

  validateConfiguration(input: SettingsInput): ConfigValidationResult {
    const errors: ConfigIssue[] = [];

    const clientId = input.clientId ?? '';
    const clientSecret = input.clientSecret ?? '';
    const tenantId = input.tenantId ?? '';

    if (!clientId) {
      errors.push({ field: 'clientId', message: requiredMessage('client ID', 'clientId') });
    }
    if (!clientSecret) {
      errors.push({ field: 'clientSecret', message: requiredMessage('client secret', 'clientSecret') });
    }
    if (!tenantId) {
      errors.push({ field: 'tenantId', message: requiredMessage('tenant ID', 'tenantId') });
    }

    const format = input.format ?? DEFAULT_SETTINGS.format;
    if (!isOutputFormat(format)) {
      errors.push({ field: 'format', message: `invalid format '${format}': must be 'text' or 'json'` });
    }

    const threshold = parseThreshold(input.expiryThresholdDays ?? DEFAULT_SETTINGS.expiryThresholdDays);
    if (threshold === undefined) {
      errors.push({
        field: 'expiryThresholdDays',
        message: `invalid expiry threshold '${input.expiryThresholdDays}': must be a whole number of days`
      });
    }

    if (errors.length > 0 || threshold === undefined || !isOutputFormat(format)) {
      return { isValid: false, errors };
    }

    const settings: RunSettings = Object.freeze({
      tenantId,
      clientId,
      clientSecret,
      monitorTag: input.monitorTag ?? DEFAULT_SETTINGS.monitorTag,
      expiryThresholdDays: threshold,
      format
    });

    return { isValid: true, errors, settings };
  }
}

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * Accepts integers and integer strings; anything else is rejected
 */
export function parseThreshold(value: string | number): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : undefined;
  }
  const trimmed = value.trim();
  return INTEGER_PATTERN.test(trimmed) ? parseInt(trimmed, 10) : undefined;
}

function requiredMessage(label: string, key: SettingKey): string {
  const { flag, envVar } = SETTING_DESCRIPTORS[key];
  return `${label} is required (use ${flag} flag, ${envVar} env var, or config file)`;
}

function parseConfigObject(raw: Record<string, unknown>, filePath: string): SettingsInput {
  const settings: SettingsInput = {};

  for (const key of SETTING_KEYS) {
    const { configKey } = SETTING_DESCRIPTORS[key];
    const value = raw[configKey];
    if (value === undefined || value === null) {
      continue;
    }

    if (key === 'expiryThresholdDays') {
      if (typeof value !== 'number' && typeof value !== 'string') {
        throw new ConfigurationError(`invalid value for '${configKey}' in config file ${filePath}`);
      }
      settings.expiryThresholdDays = value;
      continue;
    }

    if (typeof value !== 'string') {
      throw new ConfigurationError(`invalid value for '${configKey}' in config file ${filePath}`);
    }
    settings[key] = value;
  }

  return settings;
}

function withoutUndefined(input: SettingsInput): SettingsInput {
  const result: SettingsInput = {};
  for (const key of SETTING_KEYS) {
    const value = input[key];
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
