import { describe, expect, it, vi } from 'vitest';
import type { ExchangeOptions } from '../agent/loop.js';
import { ToolCollection } from '../agent/tools/index.js';
import type { OsActions } from '../os/actions.js';
import { RemoteExchangeError } from '../shared/errors.js';
import { describeFastPathAction, FastPathDispatcher } from './fast-path.js';
import { NotificationSink, StatusChannel, type SpeechOutput, type StatusMessage } from './notifications.js';
import {
  cleanCommandText,
  matchControlPhrase,
  Orchestrator,
  type FastPathMode,
  type IntakeResult,
} from './orchestrator.js';
import type { TaskHandle } from './scheduler.js';
import type { Command, Turn } from './types.js';

class FakeSpeech implements SpeechOutput {
  spoken: string[] = [];
  stops = 0;

  speak(text: string): void {
    this.spoken.push(text);
  }

  stop(): void {
    this.stops++;
  }
}

type FakeExchange = (options: ExchangeOptions) => Promise<readonly Turn[]>;

const flush = () => new Promise<void>(resolve => setTimeout(resolve, 0));

const typed = (text: string): Command => ({ text, source: 'typed' });

function waitForAbort(signal: AbortSignal): Promise<void> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

function submitted(result: IntakeResult): TaskHandle {
  if (result.kind !== 'submitted') throw new Error(`expected a submitted task, got ${result.kind}`);
  return result.handle;
}

function setup(options: { mode?: FastPathMode; os?: OsActions; exchange?: FakeExchange } = {}) {
  const speech = new FakeSpeech();
  const channel = new StatusChannel();
  const messages: StatusMessage[] = [];
  channel.subscribe(message => messages.push(message));

  const os: OsActions = options.os ?? {
    launchApp: vi.fn(async () => true),
    quitApp: vi.fn(async () => true),
  };
  const runExchange = vi.fn(options.exchange ?? (async (exchange: ExchangeOptions) => exchange.history));

  const orchestrator = new Orchestrator({
    sink: new NotificationSink(speech, channel),
    fastPath: new FastPathDispatcher(os),
    fastPathMode: options.mode ?? 'annotate',
    runExchange,
    exchange: {
      model: 'test-model',
      systemPromptSuffix: 'Be brief.',
      credentials: { apiKey: 'test-secret' },
      imageRetentionLimit: 3,
      tools: new ToolCollection([]),
    },
  });

  return { speech, channel, messages, os, runExchange, orchestrator };
}

describe('cleanCommandText', () => {
  it('strips the echoed listening cue', () => {
    expect(cleanCommandText('Listening... open the calculator')).toBe('open the calculator');
    expect(cleanCommandText('listening, Open Safari')).toBe('Open Safari');
  });

  it('keeps words that merely start with the cue', () => {
    expect(cleanCommandText('listeningpost status')).toBe('listeningpost status');
  });

  it('reduces a bare cue to nothing', () => {
    expect(cleanCommandText('Listening.')).toBe('');
  });
});

describe('matchControlPhrase', () => {
  it('recognises stop and reset phrases', () => {
    expect(matchControlPhrase('Stop.')).toBe('stop');
    expect(matchControlPhrase('never mind')).toBe('stop');
    expect(matchControlPhrase('Start over!')).toBe('reset');
    expect(matchControlPhrase('clear history')).toBe('reset');
  });

  it('ignores phrases inside longer commands', () => {
    expect(matchControlPhrase('stop the music')).toBeNull();
  });
});

describe('Orchestrator', () => {
  it('ignores empty commands', async () => {
    const { orchestrator, speech, runExchange } = setup();

    expect(await orchestrator.handleCommand(typed('Listening.'))).toEqual({ kind: 'ignored' });
    expect(speech.spoken).toEqual([]);
    expect(runExchange).not.toHaveBeenCalled();
  });

  it('short-circuits a fast-path hit', async () => {
    const { orchestrator, speech, runExchange, channel } = setup({ mode: 'short-circuit' });

    const result = await orchestrator.handleCommand(typed('open safari'));

    expect(result).toEqual({
      kind: 'fast-path',
      outcome: { intent: 'open', app: 'safari', note: describeFastPathAction('open', 'safari') },
    });
    expect(speech.spoken).toEqual(['Processing', 'Done']);
    expect(runExchange).not.toHaveBeenCalled();
    expect(orchestrator.history.length).toBe(0);
    expect(channel.last?.text).toBe('Opened safari');
  });

  it('annotates the user turn with the fast-path note', async () => {
    const { orchestrator, speech, runExchange } = setup({ mode: 'annotate' });

    const handle = submitted(await orchestrator.handleCommand(typed('Open Safari')));
    expect(await handle.done).toEqual({ state: 'completed' });

    expect(runExchange).toHaveBeenCalledTimes(1);
    const [options] = runExchange.mock.calls[0];
    expect(options.history).toEqual([
      {
        role: 'user',
        content: [
          { type: 'text', text: 'Open Safari' },
          { type: 'text', text: `\n\n(${describeFastPathAction('open', 'safari')})` },
        ],
      },
    ]);
    expect(options.model).toBe('test-model');
    expect(speech.spoken).toEqual(['Processing']);
  });

  it('submits misses without a note', async () => {
    const { orchestrator, os } = setup();

    const handle = submitted(await orchestrator.handleCommand(typed('what time is it')));
    await handle.done;

    expect(os.launchApp).not.toHaveBeenCalled();
    expect(orchestrator.history.last()?.content).toEqual([{ type: 'text', text: 'what time is it' }]);
  });

  it('handles stop and reset phrases locally', async () => {
    const { orchestrator, speech, runExchange } = setup();

    expect(await orchestrator.handleCommand(typed('Stop.'))).toEqual({ kind: 'stopped' });
    expect(speech.stops).toBe(1);

    expect(await orchestrator.handleCommand(typed('start over'))).toEqual({ kind: 'reset' });
    expect(speech.spoken).toEqual(['History reset']);
    expect(runExchange).not.toHaveBeenCalled();
  });

  it('speaks progress text and publishes tool output', async () => {
    const { orchestrator, speech, messages } = setup({
      exchange: async (options) => {
        options.onProgress({ type: 'text', text: 'Opening Safari now' });
        options.onToolOutput({ output: 'ok' }, 'tool-1');
        return options.history;
      },
    });

    const handle = submitted(await orchestrator.handleCommand(typed('search for cats')));
    await handle.done;

    expect(speech.spoken).toEqual(['Processing', 'Opening Safari now']);
    expect(messages.filter(m => m.kind === 'tool').map(m => m.text)).toEqual(['Tool: tool-1']);
    expect(messages[messages.length - 1].kind).toBe('completed');
  });

  it('supersedes a running task without announcing it', async () => {
    const { orchestrator, speech } = setup({
      exchange: async (options) => {
        await waitForAbort(options.signal);
        return options.history;
      },
    });

    const first = submitted(await orchestrator.handleCommand(typed('search for cats')));
    await flush();
    expect(first.state).toBe('running');

    const second = submitted(await orchestrator.handleCommand(typed('what time is it')));

    expect(await first.done).toEqual({ state: 'cancelled' });
    expect(speech.spoken).toEqual(['Processing', 'Processing']);
    expect(orchestrator.history.snapshot().map(turn => turn.role)).toEqual(['user', 'user']);

    await flush();
    expect(orchestrator.status()).toEqual({ task: { id: second.id, state: 'running' }, turns: 2 });

    orchestrator.stop();
    expect(await second.done).toEqual({ state: 'cancelled' });
    expect(speech.spoken).toEqual(['Processing', 'Processing', 'Interrupted']);
  });

  it('discards results that land after a reset', async () => {
    let release: () => void = () => {};
    const released = new Promise<void>(resolve => {
      release = resolve;
    });
    let committed: boolean | null = null;

    const { orchestrator, speech } = setup({
      exchange: async (options) => {
        await released;
        committed = options.commit({ role: 'assistant', content: [{ type: 'text', text: 'late' }] });
        return options.history;
      },
    });

    const handle = submitted(await orchestrator.handleCommand(typed('search for cats')));
    await flush();

    orchestrator.reset();
    release();

    expect(await handle.done).toEqual({ state: 'cancelled' });
    expect(committed).toBe(false);
    expect(orchestrator.history.length).toBe(0);
    expect(speech.spoken).toEqual(['Processing', 'History reset']);
  });

  it('announces a failed exchange', async () => {
    const { orchestrator, speech, channel } = setup({
      exchange: async () => {
        throw new RemoteExchangeError('Remote request failed: overloaded');
      },
    });

    const handle = submitted(await orchestrator.handleCommand(typed('search for cats')));
    const outcome = await handle.done;

    expect(outcome.state).toBe('failed');
    expect(speech.spoken).toEqual(['Processing', 'Sorry, something went wrong.']);
    expect(channel.last?.kind).toBe('failed');
    expect(channel.last?.text).toBe('Remote request failed: overloaded');
  });

  it('processes commands in arrival order', async () => {
    let finishLaunch: (ok: boolean) => void = () => {};
    const launched = new Promise<boolean>(resolve => {
      finishLaunch = resolve;
    });
    const os: OsActions = {
      launchApp: vi.fn(() => launched),
      quitApp: vi.fn(async () => true),
    };
    const { orchestrator } = setup({ mode: 'short-circuit', os });

    const first = orchestrator.handleCommand(typed('open safari'));
    const second = orchestrator.handleCommand(typed('close mail'));
    await flush();
    expect(os.quitApp).not.toHaveBeenCalled();

    finishLaunch(true);
    const results = await Promise.all([first, second]);

    expect(results.map(result => result.kind)).toEqual(['fast-path', 'fast-path']);
    expect(os.quitApp).toHaveBeenCalledWith('mail');
  });

  it('shutdown cancels quietly and drains', async () => {
    const { orchestrator, speech } = setup({
      exchange: async (options) => {
        await waitForAbort(options.signal);
        return options.history;
      },
    });

    const handle = submitted(await orchestrator.handleCommand(typed('search for cats')));
    await flush();

    await orchestrator.shutdown();

    expect(handle.state).toBe('cancelled');
    expect(speech.stops).toBe(1);
    expect(speech.spoken).toEqual(['Processing']);
  });
});
