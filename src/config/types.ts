/**
 * Run settings for a single monitoring pass
 */

export const OUTPUT_FORMATS = ['text', 'json'] as const;

export type OutputFormat = typeof OUTPUT_FORMATS[number];

export interface AzureCredentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface RunSettings extends AzureCredentials {
  monitorTag: string;
  expiryThresholdDays: number;
  format: OutputFormat;
}

/**
 * Unvalidated settings as read from a single source (flags, environment or config file).
 * The threshold stays a string until validation because flags and env vars are text.
 */
export interface SettingsInput {
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
  monitorTag?: string;
  expiryThresholdDays?: string | number;
  format?: string;
}

export type SettingKey = keyof SettingsInput;

export interface SettingDescriptor {
  configKey: string;
  envVar: string;
  flag: string;
}

export const ENV_PREFIX = 'AZURE';

export const SETTING_DESCRIPTORS: Record<SettingKey, SettingDescriptor> = {
  tenantId: { configKey: 'tenant_id', envVar: `${ENV_PREFIX}_TENANT_ID`, flag: '--tenant-id' },
  clientId: { configKey: 'client_id', envVar: `${ENV_PREFIX}_CLIENT_ID`, flag: '--client-id' },
  clientSecret: { configKey: 'client_secret', envVar: `${ENV_PREFIX}_CLIENT_SECRET`, flag: '--client-secret' },
  monitorTag: { configKey: 'monitor_tag', envVar: `${ENV_PREFIX}_MONITOR_TAG`, flag: '--monitor-tag' },
  expiryThresholdDays: {
    configKey: 'expiry_threshold_days',
    envVar: `${ENV_PREFIX}_EXPIRY_THRESHOLD_DAYS`,
    flag: '--expiry-threshold-days'
  },
  format: { configKey: 'format', envVar: `${ENV_PREFIX}_FORMAT`, flag: '--format' }
};

export const DEFAULT_SETTINGS = {
  monitorTag: 'MonitorSecrets',
  expiryThresholdDays: 30,
  format: 'text'
} as const satisfies SettingsInput;

export const DEFAULT_CONFIG_FILE = 'config.json';

export interface ConfigIssue {
  field: SettingKey;
  message: string;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigIssue[];
  settings?: RunSettings;
}
