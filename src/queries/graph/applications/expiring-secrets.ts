import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { GraphApplication, GraphQueryDefinition } from '../types';
import { GRAPH_ENDPOINTS, GRAPH_SELECT_FIELDS } from '../../../utils/graph-utils';
import { RunSettings } from '../../../config/types';
import { logger } from '../../../utils/logger';
import { toError } from '../../../services/base/errors';

dayjs.extend(utc);

export const EXPIRY_DATE_FORMAT = 'YYYY-MM-DD';

export interface ExpiringSecret {
  applicationName: string;
  applicationId: string;
  secretId: string;
  expiryDate: string;
  daysToExpiry: number;
}

export type ExpiringSecretsParams = Pick<RunSettings, 'monitorTag' | 'expiryThresholdDays'>;

export const expiringSecretsQuery: GraphQueryDefinition = {
  id: 'expiring_secrets',
  name: 'Expiring Application Secrets',
  description: 'Find client secrets of tagged application registrations that expire within a number of days',
  query: {
    endpoint: GRAPH_ENDPOINTS.APPLICATIONS,
    apiVersion: 'v1.0',
    select: GRAPH_SELECT_FIELDS.APPLICATION_CREDENTIALS,
    top: 999
  },
  pagination: {
    maxPages: 50
  }
};

// JavaScript has no inline flag groups; a leading (?i), (?m) or (?s) is lifted into RegExp flags
const INLINE_FLAGS = /^\(\?([ims]+)\)/;

/**
 * Build a predicate over an application's tags.
 * The pattern is an unanchored Unicode regular expression; a pattern that does
 * not compile is compared to each tag verbatim instead.
 */
export function createTagMatcher(pattern: string): (tags: readonly string[]) => boolean {
  const regex = compileTagPattern(pattern);
  if (!regex) {
    return tags => tags.some(tag => tag === pattern);
  }
  return tags => tags.some(tag => regex.test(tag));
}

function compileTagPattern(pattern: string): RegExp | undefined {
  const inline = INLINE_FLAGS.exec(pattern);
  const source = inline ? pattern.slice(inline[0].length) : pattern;
  const flags = inline ? `u${inline[1]}` : 'u';

  try {
    return new RegExp(source, flags);
  } catch (error) {
    logger.debug('Monitor tag is not a valid regular expression, using exact match', {
      pattern,
      reason: toError(error).message
    });
    return undefined;
  }
}

export function matchesMonitorTag(tags: readonly string[], pattern: string): boolean {
  return createTagMatcher(pattern)(tags);
}

/**
 * Whole days from `now` until `expiry`, with the partial day dropped
 * (23h59m -> 0, 24h01m -> 1, 36h ago -> -1).
 */
export function calculateDaysToExpiry(expiry: string | Date, now: Date): number {
  return dayjs.utc(expiry).diff(dayjs.utc(now), 'day');
}

export function formatExpiryDate(expiry: string | Date): string {
  return dayjs.utc(expiry).format(EXPIRY_DATE_FORMAT);
}

/**
 * Select the password credentials of tagged applications that expire within
 * the threshold, already expired ones included. Results keep listing order.
 */
export function evaluateExpiringSecrets(
  applications: readonly GraphApplication[],
  params: ExpiringSecretsParams,
  now: Date = new Date()
): ExpiringSecret[] {
  const matchesTag = createTagMatcher(params.monitorTag);
  const results: ExpiringSecret[] = [];

  for (const app of applications) {
    if (!matchesTag(app.tags)) {
      continue;
    }

    for (const credential of app.passwordCredentials) {
      if (!credential.endDateTime) {
        continue;
      }

      const expiry = dayjs.utc(credential.endDateTime);
      if (!expiry.isValid()) {
        logger.debug('Skipping credential with unparseable expiry', {
          applicationId: app.appId,
          keyId: credential.keyId
        });
        continue;
      }

      const daysToExpiry = calculateDaysToExpiry(credential.endDateTime, now);
      if (daysToExpiry > params.expiryThresholdDays) {
        continue;
      }

      // Partially populated records are skipped, not fatal
      if (typeof credential.keyId !== 'string' ||
          typeof app.displayName !== 'string' ||
          typeof app.appId !== 'string') {
        continue;
      }

      results.push({
        applicationName: app.displayName,
        applicationId: app.appId,
        secretId: credential.keyId,
        expiryDate: expiry.format(EXPIRY_DATE_FORMAT),
        daysToExpiry
      });
    }
  }

  return results;
}
