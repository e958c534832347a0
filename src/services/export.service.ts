import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { OutputFormat, RunSettings } from '../config/types';
import { ExpiringSecret } from '../queries/graph/applications';

dayjs.extend(utc);

export const REPORT_TIMESTAMP_FORMAT = 'YYYY-MM-DDTHH:mm:ss[Z]';
const SEPARATOR = '-'.repeat(50);

export type ReportSettings = Pick<RunSettings, 'monitorTag' | 'expiryThresholdDays' | 'format'>;

export interface JsonReport {
  results: Array<{
    application_name: string;
    application_id: string;
    secret_id: string;
    expiry_date: string;
    days_to_expiry: number;
  }>;
  execution_info: {
    timestamp: string;
    config: {
      expiry_threshold_days: number;
      monitor_tag: string;
      format: OutputFormat;
    };
  };
}

export class ExportService {
  render(results: readonly ExpiringSecret[], settings: ReportSettings, now: Date = new Date()): string {
    switch (settings.format) {
      case 'json':
        return this.renderJson(results, settings, now);
      case 'text':
        return this.renderText(results, settings, now);
      default: {
        const unsupported: never = settings.format;
        throw new Error(`Unsupported export format: ${String(unsupported)}`);
      }
    }
  }

  formatTimestamp(now: Date): string {
    return dayjs.utc(now).format(REPORT_TIMESTAMP_FORMAT);
  }

  buildJsonReport(results: readonly ExpiringSecret[], settings: ReportSettings, now: Date): JsonReport {
    return {
      results: results.map(result => ({
        application_name: result.applicationName,
        application_id: result.applicationId,
        secret_id: result.secretId,
        expiry_date: result.expiryDate,
        days_to_expiry: result.daysToExpiry
      })),
      execution_info: {
        timestamp: this.formatTimestamp(now),
        config: {
          expiry_threshold_days: settings.expiryThresholdDays,
          monitor_tag: settings.monitorTag,
          format: settings.format
        }
      }
    };
  }

  private renderJson(results: readonly ExpiringSecret[], settings: ReportSettings, now: Date): string {
    return `${JSON.stringify(this.buildJsonReport(results, settings, now), null, 2)}\n`;
  }

  private renderText(results: readonly ExpiringSecret[], settings: ReportSettings, now: Date): string {
    const lines = [
      'Azure Secret Monitor Report',
      `Generated at: ${this.formatTimestamp(now)}`,
      'Configuration:',
      `  - Expiry Threshold: ${settings.expiryThresholdDays} days`,
      `  - Monitor Tag: ${settings.monitorTag}`,
      ''
    ];

    if (results.length === 0) {
      lines.push('No expiring secrets found.');
      return `${lines.join('\n')}\n`;
    }

    lines.push(`Found ${results.length} expiring secrets:`, '');
    for (const result of results) {
      lines.push(
        `Application: ${result.applicationName}`,
        `App ID: ${result.applicationId}`,
        `Secret ID: ${result.secretId}`,
        `Expiry Date: ${result.expiryDate}`,
        `Days Until Expiry: ${result.daysToExpiry}`,
        SEPARATOR
      );
    }

    return `${lines.join('\n')}\n`;
  }
}

// Export singleton instance
export const exportService = new ExportService();
