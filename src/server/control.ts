/**
 * Control commands and their mapping to process signals.
 */

import { createLogger, errorMessage } from '../logging/index.js';

const log = createLogger({ component: 'control' });

export const ControlCommands = {
  /** Rolling restart of every worker */
  RELOAD: 'reload',

  /** Drain workers within the grace period, then stop */
  GRACEFUL_SHUTDOWN: 'graceful_shutdown',

  /** Abort in-flight requests and stop */
  IMMEDIATE_SHUTDOWN: 'immediate_shutdown',
} as const;

export type ControlCommand = (typeof ControlCommands)[keyof typeof ControlCommands];

/**
 * Process signals and the command each one issues.
 */
export const SIGNAL_COMMANDS = {
  SIGHUP: ControlCommands.RELOAD,
  SIGTERM: ControlCommands.GRACEFUL_SHUTDOWN,
  SIGINT: ControlCommands.IMMEDIATE_SHUTDOWN,
  SIGQUIT: ControlCommands.IMMEDIATE_SHUTDOWN,
} as const satisfies Partial<Record<NodeJS.Signals, ControlCommand>>;

export type ControlSignal = keyof typeof SIGNAL_COMMANDS;

/**
 * Anything that executes control commands.
 */
export interface CommandTarget {
  handleCommand(command: ControlCommand, source?: string): Promise<void>;
}

/**
 * Where signals come from (process, or a fake in tests).
 */
export interface SignalSource {
  on(signal: ControlSignal, listener: () => void): unknown;
  off(signal: ControlSignal, listener: () => void): unknown;
}

/**
 * Route SIGHUP, SIGTERM, SIGINT and SIGQUIT to the target.
 *
 * @returns A function that removes the handlers
 */
export function installSignalHandlers(
  target: CommandTarget,
  source: SignalSource = process
): () => void {
  const installed: Array<[ControlSignal, () => void]> = [];

  for (const [signal, command] of Object.entries(SIGNAL_COMMANDS)) {
    if (!isControlSignal(signal)) {
      continue;
    }
    const listener = (): void => {
      log.info(`Received ${signal}`, { operation: 'signal', signal, command });
      target.handleCommand(command, signal).catch((error: unknown) => {
        log.error(`${command} failed: ${errorMessage(error)}`, {
          operation: 'signal',
          signal,
          command,
          error_message: errorMessage(error),
        });
      });
    };
    source.on(signal, listener);
    installed.push([signal, listener]);
  }

  return () => {
    for (const [signal, listener] of installed) {
      source.off(signal, listener);
    }
  };
}

function isControlSignal(value: string): value is ControlSignal {
  return value in SIGNAL_COMMANDS;
}
