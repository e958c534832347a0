import { DirectoryClient } from '../config/azure';
import { RunSettings } from '../config/types';
import {
  ExpiringSecret,
  evaluateExpiringSecrets,
  expiringSecretsQuery
} from '../queries/graph/applications';
import { GraphApplication } from '../queries/graph/types';
import { DataSourceError, toError } from './base/errors';
import { logger } from '../utils/logger';

/**
 * Runs one fetch-and-evaluate pass over the directory's application registrations
 */
export class SecretMonitorService {
  constructor(
    private readonly client: DirectoryClient,
    private readonly settings: RunSettings
  ) {}

  async checkSecrets(now: Date = new Date()): Promise<ExpiringSecret[]> {
    let applications: GraphApplication[];
    try {
      applications = await this.client.listApplications(expiringSecretsQuery);
    } catch (error) {
      throw new DataSourceError('failed to check secrets', 'MONITOR_ERROR', toError(error));
    }

    const results = evaluateExpiringSecrets(applications, this.settings, now);

    logger.info(
      `Evaluated ${applications.length} applications: ${results.length} secret(s) expire within ` +
      `${this.settings.expiryThresholdDays} days`
    );

    return results;
  }
}
