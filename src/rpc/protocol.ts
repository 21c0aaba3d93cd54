export type JsonRpcId = string | number | null;

export type JsonRpcRequest = {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params?: unknown;
};

export const JSON_RPC_ERROR = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  APPLICATION_ERROR: -32000,
} as const;

export type JsonRpcErrorCode = (typeof JSON_RPC_ERROR)[keyof typeof JSON_RPC_ERROR];

export class RpcMethodError extends Error {
  readonly code: JsonRpcErrorCode;
  readonly data: Record<string, unknown>;

  constructor(code: JsonRpcErrorCode, message: string, data: Record<string, unknown> = {}) {
    super(message);
    this.name = "RpcMethodError";
    this.code = code;
    this.data = data;
  }
}

export function buildRpcMethodError(
  code: JsonRpcErrorCode,
  message: string,
  data?: Record<string, unknown>,
): RpcMethodError {
  return new RpcMethodError(code, message, data);
}

export function isRpcMethodError(error: unknown): error is RpcMethodError {
  return error instanceof RpcMethodError;
}

export function assertObjectParams(params: unknown, method: string): Record<string, unknown> {
  if (!params || typeof params !== "object" || Array.isArray(params)) {
    throw invalidParams(`${method} expects an object of params`, "params");
  }
  return params as Record<string, unknown>;
}

export function assertString(value: unknown, field: string, method: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw invalidParams(`${method}: ${field} must be a non-empty string`, field);
  }
  return value;
}

export function assertOptionalString(value: unknown, field: string, method: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw invalidParams(`${method}: ${field} must be a string`, field);
  }
  return value;
}

export function assertBoolean(value: unknown, field: string, method: string): boolean {
  if (typeof value !== "boolean") {
    throw invalidParams(`${method}: ${field} must be a boolean`, field);
  }
  return value;
}

export function assertOptionalBoolean(value: unknown, field: string, method: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  return assertBoolean(value, field, method);
}

function invalidParams(message: string, field: string): RpcMethodError {
  return buildRpcMethodError(JSON_RPC_ERROR.INVALID_PARAMS, message, {
    reason: "invalid_params",
    field,
  });
}
