/**
 * Shared types for results and WebSocket communication
 */

export type Result<T> =
  | {
      ok: true;
      value: T;
    }
  | {
      ok: false;
      error: Error;
    };

export interface WebSocketMessage<T = unknown> {
  v: number;
  id: string;
  ts: string;
  type: string;
  payload: T;
}

export interface ProcessOutput {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  duration: number;
}
