import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/beta/messages/messages';
import { RemoteExchangeError } from '../shared/errors.js';
import type { ReplyBlock } from './messages.js';

export interface RemoteReply {
  content: readonly ReplyBlock[];
  stop_reason: string | null;
}

/** One non-streaming request to the remote agent. */
export type CreateMessage = (body: MessageCreateParamsNonStreaming, signal: AbortSignal) => Promise<RemoteReply>;

export interface Credentials {
  apiKey?: string;
}

let cached: Anthropic | null = null;

/**
 * Client for the given key, reused while the key does not change.
 */
export function initClient(credentials: Credentials): Anthropic {
  const apiKey = credentials.apiKey;
  if (!apiKey) {
    throw new RemoteExchangeError('No API key provided');
  }
  if (!cached || cached.apiKey !== apiKey) {
    cached = new Anthropic({ apiKey });
  }
  return cached;
}

export function createMessageSender(credentials: Credentials): CreateMessage {
  return (body, signal) => initClient(credentials).beta.messages.create(body, { signal });
}
