import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';

// ============================================
// ERROR TAXONOMY
// ============================================

export enum ErrorKind {
  MALFORMED_REQUEST = 'MALFORMED_REQUEST',
  UNKNOWN_OPERATION = 'UNKNOWN_OPERATION',
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
  AUTHENTICATION_REQUIRED = 'AUTHENTICATION_REQUIRED',
  UNAUTHORIZED = 'UNAUTHORIZED',
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMITED = 'RATE_LIMITED',
  CANCELLED = 'CANCELLED',
  EXTERNAL_ERROR = 'EXTERNAL_ERROR',
}

// Server-defined JSON-RPC codes (-32000..-32099 is reserved for servers);
// -32800 is the LSP "request cancelled" code
export const ServerErrorCode = {
  UNAUTHORIZED: -32001,
  NOT_FOUND: -32004,
  RATE_LIMITED: -32029,
  REQUEST_CANCELLED: -32800,
} as const;

export interface ToolErrorJSON {
  type: ErrorKind;
  message: string;
  details?: unknown;
  hint?: string;
}

export class ToolError extends Error {
  constructor(
    public kind: ErrorKind,
    message: string,
    public details?: unknown,
    public hint?: string,
    public code?: number
  ) {
    super(message);
    this.name = 'ToolError';
  }

  /** JSON-RPC error code for this failure. */
  get rpcCode(): number {
    return this.code ?? rpcCodeFor(this.kind);
  }

  toJSON(): ToolErrorJSON {
    return {
      type: this.kind,
      message: this.message,
      details: this.details,
      hint: this.hint,
    };
  }
}

export function rpcCodeFor(kind: ErrorKind): number {
  switch (kind) {
    case ErrorKind.MALFORMED_REQUEST:
      return ErrorCode.InvalidRequest;
    case ErrorKind.UNKNOWN_OPERATION:
    case ErrorKind.INVALID_ARGUMENTS:
      return ErrorCode.InvalidParams;
    case ErrorKind.AUTHENTICATION_REQUIRED:
    case ErrorKind.UNAUTHORIZED:
      return ServerErrorCode.UNAUTHORIZED;
    case ErrorKind.NOT_FOUND:
      return ServerErrorCode.NOT_FOUND;
    case ErrorKind.RATE_LIMITED:
      return ServerErrorCode.RATE_LIMITED;
    case ErrorKind.CANCELLED:
      return ServerErrorCode.REQUEST_CANCELLED;
    case ErrorKind.EXTERNAL_ERROR:
      return ErrorCode.InternalError;
  }
}

export function malformed(message: string, code: number = ErrorCode.InvalidRequest): ToolError {
  return new ToolError(ErrorKind.MALFORMED_REQUEST, message, undefined, undefined, code);
}

/** `AbortSignal` rejections (DOMException or plain Error named AbortError). */
export function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}
