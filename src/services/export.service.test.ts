import { ExportService, exportService } from './export.service';
import { ExpiringSecret } from '../queries/graph/applications';

const NOW = new Date('2024-12-22T09:30:05.250Z');

const settings = {
  monitorTag: 'MonitorSecrets',
  expiryThresholdDays: 30,
  format: 'text'
} as const;

const results: ExpiringSecret[] = [
  {
    applicationName: 'MyApp1',
    applicationId: 'app-1',
    secretId: 'key-1',
    expiryDate: '2025-01-15',
    daysToExpiry: 24
  },
  {
    applicationName: 'Legacy Sync',
    applicationId: 'app-3',
    secretId: 'key-4',
    expiryDate: '2024-12-01',
    daysToExpiry: -21
  }
];

const SEPARATOR = '-'.repeat(50);

describe('ExportService', () => {
  let service: ExportService;

  beforeEach(() => {
    service = new ExportService();
  });

  it('should expose a shared instance', () => {
    expect(exportService).toBeInstanceOf(ExportService);
  });

  describe('formatTimestamp', () => {
    it('should format the UTC instant to whole seconds', () => {
      expect(service.formatTimestamp(NOW)).toBe('2024-12-22T09:30:05Z');
    });
  });

  describe('text format', () => {
    it('should render the empty report', () => {
      expect(service.render([], settings, NOW)).toBe([
        'Azure Secret Monitor Report',
        'Generated at: 2024-12-22T09:30:05Z',
        'Configuration:',
        '  - Expiry Threshold: 30 days',
        '  - Monitor Tag: MonitorSecrets',
        '',
        'No expiring secrets found.',
        ''
      ].join('\n'));
    });

    it('should render one block per result in order', () => {
      expect(service.render(results, settings, NOW)).toBe([
        'Azure Secret Monitor Report',
        'Generated at: 2024-12-22T09:30:05Z',
        'Configuration:',
        '  - Expiry Threshold: 30 days',
        '  - Monitor Tag: MonitorSecrets',
        '',
        'Found 2 expiring secrets:',
        '',
        'Application: MyApp1',
        'App ID: app-1',
        'Secret ID: key-1',
        'Expiry Date: 2025-01-15',
        'Days Until Expiry: 24',
        SEPARATOR,
        'Application: Legacy Sync',
        'App ID: app-3',
        'Secret ID: key-4',
        'Expiry Date: 2024-12-01',
        'Days Until Expiry: -21',
        SEPARATOR,
        ''
      ].join('\n'));
    });
  });

  describe('json format', () => {
    const jsonSettings = { ...settings, format: 'json' } as const;

    it('should render results with execution info', () => {
      const output = service.render(results.slice(0, 1), jsonSettings, NOW);

      expect(output.endsWith('}\n')).toBe(true);
      expect(JSON.parse(output)).toEqual({
        results: [
          {
            application_name: 'MyApp1',
            application_id: 'app-1',
            secret_id: 'key-1',
            expiry_date: '2025-01-15',
            days_to_expiry: 24
          }
        ],
        execution_info: {
          timestamp: '2024-12-22T09:30:05Z',
          config: {
            expiry_threshold_days: 30,
            monitor_tag: 'MonitorSecrets',
            format: 'json'
          }
        }
      });
    });

    it('should pretty-print with two-space indentation', () => {
      const lines = service.render([], jsonSettings, NOW).split('\n');

      expect(lines.slice(0, 3)).toEqual([
        '{',
        '  "results": [],',
        '  "execution_info": {'
      ]);
    });

    it('should render an empty result set as an array', () => {
      expect(JSON.parse(service.render([], jsonSettings, NOW)).results).toEqual([]);
    });
  });
});
