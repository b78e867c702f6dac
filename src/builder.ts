import { v4 as uuidv4 } from 'uuid';

import { StateMachine } from './fsm';
import { State } from './state';
import { Transition } from './transition';
import { Hook, IStateHooks, IStateMachineOptions, Payload } from './types';

// Eight hex chars of a v4 uuid. Collisions are possible; build() rejects them.
const generateName = (prefix: string) => `${prefix}_${uuidv4().slice(0, 8)}`;

/**
 * Stages states and transitions and validates them all at once in `build()`.
 *
 * @example
 * const builder = new StateMachineBuilder({ id: 'door' });
 * const opened = builder.addNamedState('opened');
 * const closed = builder.addNamedState('closed');
 * builder.addNamedTransition('close', opened.name, closed.name);
 * builder.addNamedTransition('open', closed.name, opened.name);
 * builder.setInitialState(closed.name);
 *
 * const door = builder.build();
 * door.transition('open');
 */
export class StateMachineBuilder<P extends Payload = Payload> {
  private _states: Array<State<P>> = [];
  private _transitions: Array<Transition<P>> = [];
  private _initial: string | undefined;

  constructor(private readonly _options: IStateMachineOptions = {}) {}

  addState(hooks?: IStateHooks<P>): State<P> {
    return this.addNamedState(generateName('state'), hooks);
  }

  /**
   * Uniqueness of `name` is checked by `build()`, not here.
   */
  addNamedState(name: string, hooks?: IStateHooks<P>): State<P> {
    const state = new State<P>(name, hooks);
    this._states.push(state);
    return state;
  }

  addTransition(
    from: string,
    to: string,
    onTransition?: Hook<P>,
  ): Transition<P> {
    return this.addNamedTransition(
      generateName('transition'),
      from,
      to,
      onTransition,
    );
  }

  addNamedTransition(
    name: string,
    from: string,
    to: string,
    onTransition?: Hook<P>,
  ): Transition<P> {
    const transition = new Transition<P>(name, from, to, onTransition);
    this._transitions.push(transition);
    return transition;
  }

  setInitialState(name: string): this {
    this._initial = name;
    return this;
  }

  build(): StateMachine<P> {
    return new StateMachine<P>({
      ...this._options,
      initial: this._initial,
      states: this._states,
      transitions: this._transitions,
    });
  }
}
