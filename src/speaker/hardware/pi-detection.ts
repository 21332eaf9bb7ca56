/**
 * Pi Hardware Detection
 *
 * Decides whether the GPIO push button can be used. Boards are recognised by
 * the device tree model string, with /proc/cpuinfo as a fallback for kernels
 * that do not expose one.
 */

import { readFileSync, existsSync } from 'node:fs';
import { createSubsystemLogger, describeError } from '../../logging/subsystem.js';
import type { InputKind, SpeakerConfiguration } from '../types/index.js';

const log = createSubsystemLogger('speaker/hardware-detection');

const DEVICE_TREE_MODEL = '/proc/device-tree/model';
const CPU_INFO = '/proc/cpuinfo';

/** Most specific prefix first */
const BOARD_NAMES: ReadonlyArray<readonly [prefix: string, name: string]> = [
  ['Raspberry Pi 5', 'Pi 5'],
  ['Raspberry Pi 4', 'Pi 4B'],
  ['Raspberry Pi 3 Model B+', 'Pi 3B+'],
  ['Raspberry Pi 3', 'Pi 3B'],
  ['Raspberry Pi Zero 2', 'Pi Zero 2W'],
  ['Raspberry Pi Zero', 'Pi Zero'],
];

function readSystemFile(path: string): string | undefined {
  if (!existsSync(path)) return undefined;
  return readFileSync(path, 'utf8');
}

/** Device tree model without its trailing NUL, or undefined when absent */
function readBoardModel(): string | undefined {
  return readSystemFile(DEVICE_TREE_MODEL)?.replace(/\0/g, '').trim();
}

export function isRaspberryPi(): boolean {
  try {
    const model = readBoardModel();
    if (model !== undefined) {
      return model.toLowerCase().includes('raspberry pi');
    }
    const cpuinfo = readSystemFile(CPU_INFO)?.toLowerCase() ?? '';
    return cpuinfo.includes('raspberry pi') || cpuinfo.includes('bcm2');
  } catch (error) {
    log.warn('Could not read board information', describeError(error));
    return false;
  }
}

/** Short board name such as "Pi 4B", or "Unknown" */
export function getPiModel(): string {
  try {
    const model = readBoardModel();
    if (model === undefined) return 'Unknown';
    return BOARD_NAMES.find(([prefix]) => model.includes(prefix))?.[1] ?? 'Unknown';
  } catch (error) {
    log.warn('Could not read board model', describeError(error));
    return 'Unknown';
  }
}

/**
 * Picks the push-to-talk input: GPIO on a Pi (or when forced), keyboard elsewhere
 */
export function resolveInputKind(config: Pick<SpeakerConfiguration, 'button' | 'forceEnable'>): InputKind {
  if (config.button.input !== 'auto') {
    return config.button.input;
  }

  if (config.forceEnable) {
    log.info('GPIO input forced on');
    return 'gpio';
  }

  if (!isRaspberryPi()) {
    log.info('No Raspberry Pi detected, using keyboard input');
    return 'keyboard';
  }

  log.info('Raspberry Pi detected, using GPIO input', { model: getPiModel() });
  return 'gpio';
}
