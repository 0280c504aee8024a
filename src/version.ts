// This module centralizes client identity values so wire metadata and transport headers stay in sync.

export const CLIENT_NAME = 'jsonrpc-courier';
export const CLIENT_VERSION = '0.1.0';
export const JSONRPC_VERSION = '2.0';

// This helper formats the identity sent by HTTP transports in the User-Agent header.
export function formatUserAgent(): string {
  return `${CLIENT_NAME}/${CLIENT_VERSION}`;
}
