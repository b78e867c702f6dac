import { Hook, Payload } from './types';

/**
 * Directed edge between two states. The name only has to be unique among
 * the transitions leaving `from`.
 */
export class Transition<P extends Payload = Payload> {
  constructor(
    readonly name: string,
    readonly from: string,
    readonly to: string,
    readonly onTransition?: Hook<P>,
  ) {}

  run(payload: Partial<P>): void {
    this.onTransition?.(payload);
  }
}

/**
 * Shorthand for `new Transition(name, from, to, onTransition)`.
 *
 * @example
 * t('idle', 'fetch', 'pending');
 */
export function t<P extends Payload = Payload>(
  from: string,
  name: string,
  to: string,
  onTransition?: Hook<P>,
): Transition<P> {
  return new Transition(name, from, to, onTransition);
}
