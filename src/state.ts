import { Hook, IStateHooks, Payload } from './types';

export class State<P extends Payload = Payload> {
  readonly onExit?: Hook<P>;
  readonly onEntry?: Hook<P>;

  constructor(
    readonly name: string,
    hooks: IStateHooks<P> = {},
  ) {
    this.onExit = hooks.onExit;
    this.onEntry = hooks.onEntry;
  }

  /**
   * Runs the exit hook, if any. Errors thrown by the hook are not caught.
   */
  exit(payload: Partial<P>): void {
    this.onExit?.(payload);
  }

  enter(payload: Partial<P>): void {
    this.onEntry?.(payload);
  }
}

export const state = <P extends Payload = Payload>(
  name: string,
  hooks?: IStateHooks<P>,
) => new State<P>(name, hooks);
