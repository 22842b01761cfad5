#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import WebSocket from 'ws';
import { createAssistant, type Assistant } from './assistant.js';
import { parseArgs } from './config/args.js';
import { loadConfig, type AssistantConfig, type EntryPoint } from './config/index.js';
import { startPanelServer, type PanelServer } from './server/index.js';
import { errorMessage } from './shared/errors.js';
import { logger } from './shared/logger.js';
import {
  createGestureLegend,
  createHelpDisplay,
  createShutdownBanner,
  createStartupBanner,
  status,
} from './shared/terminal-ui.js';
import { openFrameStream } from './triggers/frames.js';
import { GestureSource } from './triggers/gesture-source.js';
import { MicToggle } from './triggers/mic-toggle.js';
import { runTriggerLoop, type CommandSource } from './triggers/source.js';
import { TriggerStateMachine } from './triggers/state-machine.js';
import { TypedSource } from './triggers/typed-source.js';
import { WakeWordSource } from './triggers/wake-word-source.js';

const SEND_TIMEOUT_MS = 5000;

function printHelp(): void {
  console.log(createHelpDisplay());
}

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    logger.debug('Config', 'Could not read package version', error);
  }
  return 'dev';
}

function logStatusToConsole(assistant: Assistant): void {
  assistant.channel.subscribe((message) => {
    if (message.kind === 'progress') {
      logger.info('Agent', message.text);
    } else {
      logger.debug('Agent', `[${message.kind}] ${message.text}`);
    }
  });
}

/**
 * Run sources until they close or SIGINT arrives, then drain the scheduler.
 */
async function runUntilStopped(assistant: Assistant, sources: CommandSource[], panel?: PanelServer): Promise<void> {
  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    console.log(createShutdownBanner());
    sources.forEach(source => source.close());
    await assistant.orchestrator.shutdown();
    await panel?.close();
  };

  process.once('SIGINT', () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Config', 'Shutdown failed', error);
        process.exit(1);
      });
  });

  await Promise.all(sources.map(source => runTriggerLoop(source, assistant.orchestrator)));
  await shutdown();
}

function boot(config: AssistantConfig, entry: EntryPoint, details: string[]): Assistant {
  logger.setLevel(config.logLevel);
  if (!config.anthropicApiKey) {
    console.log(status.missingApiKey());
  }
  console.log(createStartupBanner(entry, config.model, details));
  const assistant = createAssistant(config, entry);
  if (entry !== 'panel') logStatusToConsole(assistant);
  return assistant;
}

async function startGesture(config: AssistantConfig): Promise<void> {
  const assistant = boot(config, 'gesture', [
    `🖐️  Landmarks: ${config.landmarkCommand ?? 'stdin'}`,
  ]);
  console.log(createGestureLegend(config.cooldownMs));

  const frames = openFrameStream(config.landmarkCommand);
  const source = new GestureSource({
    frames: frames.lines,
    machine: new TriggerStateMachine(config.cooldownMs),
    capture: assistant.capture,
    speech: assistant.speech,
    onReset: () => assistant.orchestrator.reset(),
  });

  try {
    await runUntilStopped(assistant, [source]);
  } finally {
    frames.close();
  }
}

async function startHeadless(config: AssistantConfig): Promise<void> {
  const assistant = boot(config, 'headless', [
    `🗣️  Wake words: ${config.wakeWords.join(', ')}`,
  ]);
  const source = new WakeWordSource({
    capture: assistant.capture,
    speech: assistant.speech,
    wakeWords: config.wakeWords,
    windowMs: config.wakeWindowMs,
  });
  await runUntilStopped(assistant, [source]);
}

async function startPanel(config: AssistantConfig): Promise<void> {
  const assistant = boot(config, 'panel', [`🌐 Port: ${config.port}`]);
  const typed = new TypedSource();
  const mic = new MicToggle({
    capture: assistant.capture,
    speech: assistant.speech,
    onTranscript: (text) => {
      typed.push(text);
    },
    onStateChange: (state) => assistant.sink.status(`Mic ${state}`),
  });

  const panel = startPanelServer({
    orchestrator: assistant.orchestrator,
    typed,
    mic,
    channel: assistant.channel,
    version: readVersion(),
  }, config.port);

  await runUntilStopped(assistant, [typed], panel);
}

/**
 * Send one typed command to a running panel over its WebSocket.
 */
async function sendCommand(port: number, text: string): Promise<void> {
  const url = `ws://127.0.0.1:${port}/ws`;
  await new Promise<void>((resolve, reject) => {
    const ws = new WebSocket(url);
    const timer = setTimeout(() => {
      ws.terminate();
      reject(new Error(`Timed out after ${SEND_TIMEOUT_MS}ms`));
    }, SEND_TIMEOUT_MS);

    ws.on('open', () => {
      ws.send(JSON.stringify({ type: 'command', text }), (error) => {
        clearTimeout(timer);
        ws.close();
        if (error) reject(error);
        else resolve();
      });
    });
    ws.on('error', (error) => {
      clearTimeout(timer);
      reject(error);
    });
  }).catch((error: unknown) => {
    console.log(status.panelUnreachable(url));
    throw error;
  });
  console.log(`Sent: ${text}`);
}

async function main(): Promise<void> {
  const { cmd, positional, flags } = parseArgs(process.argv.slice(2));

  if (flags.help || cmd === 'help') {
    printHelp();
    return;
  }

  const config = loadConfig(process.env, flags);

  switch (cmd) {
    case 'gesture':
      await startGesture(config);
      return;
    case 'headless':
      await startHeadless(config);
      return;
    case 'panel':
      await startPanel(config);
      return;
    case 'send': {
      const text = positional.join(' ').trim();
      if (!text) {
        console.log(status.unknownCommand('send (missing text)'));
        process.exitCode = 1;
        return;
      }
      await sendCommand(config.port, text);
      return;
    }
    default:
      console.log(status.unknownCommand(cmd));
      printHelp();
      process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error('Config', errorMessage(error));
  process.exit(1);
});
