// This module centralizes protocol identity values so the adapter, health route, and resources stay in sync.

export const MCP_PROTOCOL_VERSION = '2024-11-05';
export const JSONRPC_VERSION = '2.0';

// JSON-RPC internal error; existing callers match on this exact code for every failure.
export const JSONRPC_INTERNAL_ERROR = -32603;

export const SUPPORTED_TRANSPORTS = ['sse', 'streamable_http'] as const;
