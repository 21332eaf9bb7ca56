/**
 * Speaker Entry Point
 *
 * Initialization and lifecycle for the push-to-talk speaker. Holds the single
 * orchestrator instance used by the CLI.
 */

import { createSubsystemLogger, describeError } from '../logging/subsystem.js';
import {
  SpeakerOrchestrator,
  type SpeakerOrchestratorConfig,
  type SpeakerOrchestratorDependencies,
  type SpeakerStatus,
  type SpeakerSystemEvent,
} from './speaker-orchestrator.js';

const log = createSubsystemLogger('speaker/index');

let speakerOrchestrator: SpeakerOrchestrator | null = null;

const DEFAULT_EVENT_HANDLING: SpeakerOrchestratorConfig['eventHandling'] = {
  logAllEvents: true,
  maxEventHistory: 500,
};

/**
 * Creates and starts the speaker. Rethrows startup failures after cleaning up
 * so the caller can exit non-zero.
 */
export async function initializeSpeaker(
  config: Pick<SpeakerOrchestratorConfig, 'speaker'> & Partial<SpeakerOrchestratorConfig>,
  deps: Partial<SpeakerOrchestratorDependencies> = {},
): Promise<SpeakerOrchestrator> {
  if (speakerOrchestrator) {
    log.warn('Speaker already initialized');
    return speakerOrchestrator;
  }

  log.info('Initializing speaker...');
  const orchestrator = new SpeakerOrchestrator(
    {
      ...config,
      eventHandling: { ...DEFAULT_EVENT_HANDLING, ...config.eventHandling },
    },
    deps,
  );
  setupGlobalEventHandlers(orchestrator);

  try {
    await orchestrator.start();
  } catch (error) {
    log.error('Failed to initialize speaker', describeError(error));
    orchestrator.removeAllListeners();
    throw error;
  }

  speakerOrchestrator = orchestrator;
  log.info('Speaker initialized successfully');
  return orchestrator;
}

export async function shutdownSpeaker(): Promise<void> {
  if (!speakerOrchestrator) {
    return;
  }

  const orchestrator = speakerOrchestrator;
  speakerOrchestrator = null;
  try {
    log.info('Shutting down speaker...');
    await orchestrator.stop();
    orchestrator.removeAllListeners();
    log.info('Speaker shutdown completed');
  } catch (error) {
    log.error('Error during speaker shutdown', describeError(error));
  }
}

export function getSpeakerStatus(): SpeakerStatus | null {
  return speakerOrchestrator ? speakerOrchestrator.getStatus() : null;
}

export function getRecentSpeakerEvents(limit: number = 50): SpeakerSystemEvent[] {
  return speakerOrchestrator ? speakerOrchestrator.getRecentEvents(limit) : [];
}

function setupGlobalEventHandlers(orchestrator: SpeakerOrchestrator): void {
  orchestrator.on('systemEvent', (event: SpeakerSystemEvent) => {
    if (event.type === 'tool' && event.severity === 'info') {
      log.info(event.message, { eventId: event.id, data: event.data });
    }
  });
}

export * from './speaker-orchestrator.js';
export * from './errors.js';
export * from './types/index.js';
export * from './audio/index.js';
export * from './button/index.js';
export * from './dispatcher/index.js';
export * from './hardware/index.js';
export * from './realtime/index.js';
export * from './session/index.js';
export * from './tools/index.js';
