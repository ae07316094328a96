import { NomadClient } from '../clients/nomad.js';
import { sendJson, type TransportOptions } from '../clients/http.js';
import { parseResponse, tokenResponseSchema, type UserInfo } from '../clients/schemas.js';
import type { IEnvConfig } from '../config/env.js';
import { AuthError, NomadError } from '../errors.js';

export type AuthMethod = 'token' | 'password';

export interface Credentials {
  username?: string | undefined;
  password?: string | undefined;
}

export interface Session {
  baseUrl: string;
  token: string;
  user: UserInfo;
}

/** Exchanges a username/password pair for an access token via `auth/token`. */
export async function requestToken(
  baseUrl: string,
  username: string,
  password: string,
  transport: TransportOptions = {},
): Promise<string> {
  const response = await sendJson({ method: 'GET', baseUrl, path: 'auth/token', query: { username, password } }, transport);
  try {
    return parseResponse(tokenResponseSchema, response, 'auth/token').access_token;
  } catch (error) {
    if (error instanceof NomadError) {
      throw new AuthError('Access token not found in response', undefined, { path: 'auth/token' }, { cause: error });
    }
    throw error;
  }
}

export function tokenFromEnv(env: NodeJS.ProcessEnv = process.env): string {
  const token = env.NOMAD_CLIENT_ACCESS_TOKEN?.trim();
  if (!token) {
    throw new AuthError("Token not found in environment variable 'NOMAD_CLIENT_ACCESS_TOKEN'");
  }
  return token;
}

export async function verifyToken(baseUrl: string, token: string, transport: TransportOptions = {}): Promise<UserInfo> {
  const client = new NomadClient({ baseUrl, token, fetch: transport.fetch, timeoutMs: transport.timeoutMs });
  return client.getCurrentUser();
}

export async function authenticate(
  baseUrl: string,
  method: AuthMethod,
  credentials: Credentials = {},
  transport: TransportOptions = {},
): Promise<Session> {
  let token: string;
  if (method === 'password') {
    if (!credentials.username || !credentials.password) {
      throw new AuthError('Username and password are required for password authentication');
    }
    token = await requestToken(baseUrl, credentials.username, credentials.password, transport);
  } else {
    token = tokenFromEnv();
  }

  const user = await verifyToken(baseUrl, token, transport);
  return { baseUrl, token, user };
}

/**
 * Builds a verified session from configuration: the access token when one is
 * set, otherwise the username/password pair.
 */
export async function resolveSession(config: IEnvConfig, transport: TransportOptions = {}): Promise<Session> {
  const { token, username, password } = config.credentials;
  const effective: TransportOptions = { timeoutMs: config.requestTimeoutMs, ...transport };

  if (token) {
    const user = await verifyToken(config.baseUrl, token, effective);
    return { baseUrl: config.baseUrl, token, user };
  }
  if (username && password) {
    return authenticate(config.baseUrl, 'password', { username, password }, effective);
  }
  throw new AuthError('Set NOMAD_CLIENT_ACCESS_TOKEN, or NOMAD_USERNAME and NOMAD_PASSWORD.');
}
