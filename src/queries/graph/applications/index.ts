export * from './expiring-secrets';
