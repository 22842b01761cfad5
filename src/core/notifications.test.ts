import { describe, expect, it, vi } from 'vitest';
import { NotificationSink, StatusChannel, type SpeechOutput, type StatusMessage } from './notifications.js';

function fakeSpeech() {
  const spoken: string[] = [];
  const speech: SpeechOutput = {
    speak: (text) => {
      spoken.push(text);
    },
    stop: vi.fn(),
  };
  return { speech, spoken };
}

describe('StatusChannel', () => {
  it('delivers messages until unsubscribed', () => {
    const channel = new StatusChannel();
    const received: StatusMessage[] = [];
    const unsubscribe = channel.subscribe(message => received.push(message));

    channel.publish('status', 'one');
    unsubscribe();
    channel.publish('status', 'two');

    expect(received.map(m => m.text)).toEqual(['one']);
    expect(channel.last?.text).toBe('two');
  });

  it('isolates subscribers that throw', () => {
    const channel = new StatusChannel();
    const received: string[] = [];
    channel.subscribe(() => {
      throw new Error('bad subscriber');
    });
    channel.subscribe(message => received.push(message.text));

    expect(() => channel.publish('progress', 'hello', 'task-1')).not.toThrow();
    expect(received).toEqual(['hello']);
  });
});

describe('NotificationSink', () => {
  it('speaks and publishes progress', () => {
    const { speech, spoken } = fakeSpeech();
    const sink = new NotificationSink(speech);

    sink.progress('Opening mail', 'task-1');

    expect(spoken).toEqual(['Opening mail']);
    expect(sink.channel.last).toMatchObject({ kind: 'progress', text: 'Opening mail', taskId: 'task-1' });
  });

  it('publishes status, completion and tool output silently', () => {
    const { speech, spoken } = fakeSpeech();
    const sink = new NotificationSink(speech);

    sink.status('Working');
    sink.toolOutput('tool-7', 'task-1');
    expect(sink.channel.last).toMatchObject({ kind: 'tool', text: 'Tool: tool-7' });
    sink.completed('task-1');

    expect(spoken).toEqual([]);
    expect(sink.channel.last).toMatchObject({ kind: 'completed', text: 'Ready', taskId: 'task-1' });
  });

  it('announces cancellation unless told not to', () => {
    const { speech, spoken } = fakeSpeech();
    const sink = new NotificationSink(speech);

    sink.cancelled('task-1');
    sink.cancelled('task-2', { spoken: false });

    expect(spoken).toEqual(['Interrupted']);
    expect(sink.channel.last).toMatchObject({ kind: 'cancelled', taskId: 'task-2' });
  });

  it('speaks an apology on failure and publishes the reason', () => {
    const { speech, spoken } = fakeSpeech();
    const sink = new NotificationSink(speech, new StatusChannel(), {
      cancelled: 'Stopped',
      failed: 'That did not work.',
    });

    sink.failed('Remote request failed: timeout', 'task-3');

    expect(spoken).toEqual(['That did not work.']);
    expect(sink.channel.last).toMatchObject({ kind: 'failed', text: 'Remote request failed: timeout' });
  });

  it('stop silences speech', () => {
    const { speech } = fakeSpeech();
    new NotificationSink(speech).stop();
    expect(speech.stop).toHaveBeenCalledTimes(1);
  });
});
