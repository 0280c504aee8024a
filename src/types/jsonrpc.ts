// This file defines the JSON-RPC 2.0 payload types shared by the builder, validator, processor and client.

export type JsonRpcId = string | number | null;

export type JsonRpcParams = unknown[] | Record<string, unknown>;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  method: string;
  params?: JsonRpcParams;
  id?: JsonRpcId;
}

export type JsonRpcNotification = Omit<JsonRpcRequest, 'id'>;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export type JsonRpcBatchResponse = JsonRpcResponse[];

// Anything a caller may hand to JsonRpcClient.send.
export type OutboundMessage = JsonRpcRequest | readonly JsonRpcRequest[] | string;
