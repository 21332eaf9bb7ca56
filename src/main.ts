#!/usr/bin/env node
/**
 * Command-line entry for the speaker.
 *
 *   pi-voice-speaker [run]              talk through the push-to-talk button
 *   pi-voice-speaker button-test        print a line for every button press
 *   pi-voice-speaker send-audio <wav>   send a recording and play the reply
 *
 * Options: --debug, --json-logs, --env-dir <dir>
 */

import { readFile } from 'node:fs/promises';
import { USAGE, parseCommandLine } from './cli-args.js';
import { loadSpeakerConfiguration } from './config/environment.js';
import { createSubsystemLogger, describeError, setJsonLogging, setLogLevel } from './logging/subsystem.js';
import { AudioPlayer } from './speaker/audio/audio-player.js';
import { runButtonTest } from './speaker/button/button-test.js';
import { ConfigurationError } from './speaker/errors.js';
import { resolveInputKind } from './speaker/hardware/pi-detection.js';
import { initializeSpeaker, shutdownSpeaker } from './speaker/index.js';
import { RealtimeClient } from './speaker/realtime/realtime-client.js';
import { sendAudio } from './speaker/session/send-audio.js';
import { createButton } from './speaker/speaker-orchestrator.js';

const log = createSubsystemLogger('main');

/** Resolves on the first SIGINT or SIGTERM */
function waitForExitSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

async function run(envDir: string | undefined): Promise<number> {
  const { speaker, env } = loadSpeakerConfiguration({ cwd: envDir });
  const orchestrator = await initializeSpeaker({ speaker, env });

  log.info('Application is running. Press Ctrl+C to exit.');

  const reason = await new Promise<string>(resolve => {
    void waitForExitSignal().then(signal => resolve(signal));
    orchestrator.once('quitRequested', () => resolve('quit'));
    orchestrator.once('disconnected', () => resolve('disconnected'));
  });

  log.info('Exiting gracefully.', { reason });
  await shutdownSpeaker();
  return reason === 'disconnected' ? 1 : 0;
}

async function buttonTest(envDir: string | undefined): Promise<number> {
  const { speaker } = loadSpeakerConfiguration({ cwd: envDir, requireApiKey: false });
  const kind = resolveInputKind(speaker);
  const button = createButton(kind, speaker);

  const controller = new AbortController();
  void waitForExitSignal().then(() => controller.abort());

  const presses = await runButtonTest(button, { signal: controller.signal });
  log.info('Exiting gracefully.', { presses });
  return 0;
}

async function sendAudioFile(envDir: string | undefined, file: string | undefined): Promise<number> {
  if (!file) {
    throw new ConfigurationError('CONFIG_INVALID', `send-audio needs a WAV file. ${USAGE}`);
  }

  const { speaker } = loadSpeakerConfiguration({ cwd: envDir });
  const wav = await readFile(file);
  const client = new RealtimeClient({
    apiKey: speaker.realtime.apiKey,
    url: speaker.realtime.url,
    model: speaker.realtime.model,
    voice: speaker.realtime.voice,
    instructions: speaker.realtime.instructions,
    temperature: speaker.realtime.temperature,
    inputTranscriptionModel: speaker.realtime.transcriptionModel,
  });
  const player = new AudioPlayer({ device: speaker.audio.outputDevice });

  await client.connect();
  try {
    const result = await sendAudio(client, player, wav);
    if (result.transcript) {
      process.stdout.write(`${result.transcript}\n`);
    }
    return 0;
  } catch (error) {
    player.stopImmediately();
    throw error;
  } finally {
    await client.close();
  }
}

async function main(argv: string[]): Promise<number> {
  const commandLine = parseCommandLine(argv);

  switch (commandLine.kind) {
    case 'help':
      process.stdout.write(`${USAGE}\n`);
      return 0;
    case 'usage-error':
      process.stderr.write(`${commandLine.message}\n${USAGE}\n`);
      return 2;
    case 'command':
      break;
  }

  if (commandLine.debug) setLogLevel('debug');
  if (commandLine.jsonLogs) setJsonLogging(true);

  const { envDir } = commandLine;
  switch (commandLine.command) {
    case 'run':
      return run(envDir);
    case 'button-test':
      return buttonTest(envDir);
    case 'send-audio':
      return sendAudioFile(envDir, commandLine.args[0]);
  }
}

void main(process.argv.slice(2)).then(
  code => process.exit(code),
  (error: unknown) => {
    log.fatal('Fatal error', describeError(error));
    void shutdownSpeaker().finally(() => process.exit(1));
  },
);
