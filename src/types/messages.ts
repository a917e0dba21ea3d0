// Centralized message-related TypeScript types
export interface OutgoingMessage {
  type: 'error' | 'ping' | 'info' | 'gameState' | 'connected';
  payload?: unknown;
}

export interface IncomingMessage {
  type: string;
  payload?: unknown;
  [k: string]: unknown; // Allow arbitrary extra fields for extensibility
}
