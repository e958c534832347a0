import {
  AuthenticationHandler,
  AuthenticationProvider,
  Client,
  HTTPMessageHandler
} from '@microsoft/microsoft-graph-client';
import { ConfidentialClientApplication } from '@azure/msal-node';
import { AzureCredentials } from './types';
import { GraphApplication, GraphQueryDefinition, toGraphApplication } from '../queries/graph/types';
import { buildGraphRequest, mapGraphError, parseGraphResponse } from '../utils/graph-utils';
import { AuthenticationError, CredentialError, QueryError, toError } from '../services/base/errors';
import { logger } from '../utils/logger';

export const GRAPH_DEFAULT_SCOPE = 'https://graph.microsoft.com/.default';
export const DEFAULT_MAX_PAGES = 50;

export interface AzureADConfig extends AzureCredentials {
  authority?: string;
  scopes?: string[];
}

/**
 * Read access to the directory's application registrations
 */
export interface DirectoryClient {
  listApplications(query: GraphQueryDefinition): Promise<GraphApplication[]>;
}

/**
 * Microsoft Graph client authenticated with the client-credentials flow
 */
export class AzureADClient implements DirectoryClient, AuthenticationProvider {
  private readonly config: Required<AzureADConfig>;
  private readonly msalInstance: ConfidentialClientApplication;
  private graphClient: Client | null = null;

  constructor(config: AzureADConfig) {
    this.config = {
      tenantId: config.tenantId,
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      authority: config.authority || `https://login.microsoftonline.com/${config.tenantId}`,
      scopes: config.scopes?.length ? config.scopes : [GRAPH_DEFAULT_SCOPE]
    };

    try {
      this.msalInstance = new ConfidentialClientApplication({
        auth: {
          clientId: this.config.clientId,
          clientSecret: this.config.clientSecret,
          authority: this.config.authority
        }
      });
    } catch (error) {
      throw new CredentialError(`credential error: ${toError(error).message}`, toError(error));
    }
  }

  async getAccessToken(): Promise<string> {
    let accessToken: string | undefined;
    try {
      const response = await this.msalInstance.acquireTokenByClientCredential({
        scopes: this.config.scopes
      });
      accessToken = response?.accessToken;
    } catch (error) {
      logger.debug('Failed to acquire Azure AD access token', { error: toError(error).message });
      throw new AuthenticationError(`Azure AD authentication failed: ${toError(error).message}`, toError(error));
    }

    if (!accessToken) {
      throw new AuthenticationError('Azure AD authentication failed: no access token returned');
    }

    logger.debug('Acquired Azure AD access token');
    return accessToken;
  }

  /**
   * Graph client with a two-step middleware chain: authentication, then the
   * HTTP call. There is no RetryHandler, so a failed listing request is
   * reported on its first response.
   */
  getGraphClient(): Client {
    if (!this.graphClient) {
      const authHandler = new AuthenticationHandler(this);
      authHandler.setNext(new HTTPMessageHandler());

      this.graphClient = Client.initWithMiddleware({
        middleware: authHandler,
        defaultVersion: 'v1.0'
      });
    }

    return this.graphClient;
  }

  /**
   * List every application registration, following @odata.nextLink pages
   */
  async listApplications(query: GraphQueryDefinition): Promise<GraphApplication[]> {
    // Authenticate up front so token failures surface as AuthenticationError
    await this.getAccessToken();
    const records = await this.fetchAllPages(query);

    return records
      .map(toGraphApplication)
      .filter((app): app is GraphApplication => app !== undefined);
  }

  private async fetchAllPages(query: GraphQueryDefinition): Promise<unknown[]> {
    const client = this.getGraphClient();
    const maxPages = query.pagination?.maxPages ?? DEFAULT_MAX_PAGES;
    const { endpoint, apiVersion = 'v1.0', ...options } = query.query;

    let records: unknown[] = [];
    let nextLink: string | undefined;
    let pageCount = 1;
    try {
      const request = buildGraphRequest(client.api(endpoint).version(apiVersion), options);
      let page = parseGraphResponse(await request.get());
      records = [...page.data];

      while (page.nextLink && pageCount < maxPages) {
        page = parseGraphResponse(await client.api(page.nextLink).get());
        records.push(...page.data);
        pageCount++;
      }
      nextLink = page.nextLink;
    } catch (error) {
      throw new QueryError('failed to get applications', mapGraphError(error));
    }

    if (nextLink) {
      throw new QueryError(
        'failed to get applications',
        new QueryError(`listing of ${endpoint} did not finish within ${maxPages} pages`)
      );
    }

    logger.info(`${query.name}: fetched ${records.length} records from ${endpoint} in ${pageCount} page(s)`);
    return records;
  }
}
