/**
 * Assistant wiring
 * Builds one orchestrator with its boundaries for an entry point. Entry
 * points differ only in which trigger sources they attach.
 */

import { runExchange as defaultRunExchange, type RemoteExchange } from './agent/loop.js';
import { BashTool, ComputerTool, ToolCollection } from './agent/tools/index.js';
import { resolveFastPathMode, resolveImageRetention, SYSTEM_PROMPT_SUFFIXES, type AssistantConfig, type EntryPoint } from './config/index.js';
import { FastPathDispatcher } from './core/fast-path.js';
import { NotificationSink, StatusChannel, type SpeechOutput } from './core/notifications.js';
import { Orchestrator } from './core/orchestrator.js';
import { createOsActions } from './os/actions.js';
import { runProcess, type ProcessRunner } from './os/process.js';
import { AudioCapture, createOpenAITranscriber } from './speech/capture.js';
import { Speaker } from './speech/speaker.js';

export interface AssistantOverrides {
  speech?: SpeechOutput;
  runExchange?: RemoteExchange;
  run?: ProcessRunner;
}

export interface Assistant {
  readonly entry: EntryPoint;
  readonly config: AssistantConfig;
  readonly speech: SpeechOutput;
  readonly channel: StatusChannel;
  readonly sink: NotificationSink;
  readonly orchestrator: Orchestrator;
  readonly capture: AudioCapture;
}

export function createAssistant(config: AssistantConfig, entry: EntryPoint, overrides: AssistantOverrides = {}): Assistant {
  const run = overrides.run ?? runProcess;
  const speech = overrides.speech ?? new Speaker({ command: config.ttsCommand, voice: config.ttsVoice });
  const channel = new StatusChannel();
  const sink = new NotificationSink(speech, channel);

  const tools = new ToolCollection([
    new ComputerTool({ display: config.display, dataDir: config.dataDir, run }),
    new BashTool(run),
  ]);

  const orchestrator = new Orchestrator({
    sink,
    fastPath: new FastPathDispatcher(createOsActions(run), config.fastPath),
    fastPathMode: resolveFastPathMode(config, entry),
    runExchange: overrides.runExchange ?? defaultRunExchange,
    exchange: {
      model: config.model,
      systemPromptSuffix: SYSTEM_PROMPT_SUFFIXES[entry],
      credentials: { apiKey: config.anthropicApiKey },
      imageRetentionLimit: resolveImageRetention(config, entry),
      tools,
    },
  });

  const capture = new AudioCapture({
    dataDir: config.dataDir,
    transcriber: createOpenAITranscriber(config.openaiApiKey, config.sttModel),
    recordCommand: config.recordCommand,
  });

  return { entry, config, speech, channel, sink, orchestrator, capture };
}
