import { google } from 'googleapis';
import { GmailAuthClient } from '../services/email/GmailProvider';
import { AppConfig } from './index';

/**
 * Build the OAuth2 client used by the Gmail provider. Credential
 * acquisition happens elsewhere; a refresh token is enough for the
 * client to mint access tokens on demand.
 */
export function createGmailAuthClient(config: AppConfig['mail']['google']): GmailAuthClient {
  const client = new google.auth.OAuth2(config.clientId, config.clientSecret);

  if (config.refreshToken) {
    client.setCredentials({ refresh_token: config.refreshToken });
  } else {
    console.warn('⚠️ GOOGLE_REFRESH_TOKEN not set, Gmail provider is not authenticated');
  }

  return client;
}
