import type { Logger } from 'pino';

/**
 * Keyword bundle handed to every hook of a single transition.
 */
export type Payload = Record<string, unknown>;

export type Hook<P extends Payload = Payload> = (payload: Partial<P>) => void;

export interface IStateHooks<P extends Payload = Payload> {
  onExit?: Hook<P>;
  onEntry?: Hook<P>;
}

export interface IStateMachineOptions {
  /**
   * Used in error and log messages.
   * @default 'fsm'
   */
  id?: string;
  logger?: Logger;
}
