import type { Logger } from 'pino';

import {
  DuplicateEdgeError,
  DuplicateStateError,
  DuplicateTransitionNameError,
  InvalidInitialStateError,
  UnknownStateError,
  UnknownTransitionError,
} from './fsm.error';
import { logger as defaultLogger } from './logger';
import { State } from './state';
import { Transition } from './transition';
import { IStateMachineOptions, Payload } from './types';

export interface IStateMachineParameters<P extends Payload = Payload>
  extends IStateMachineOptions {
  initial: string | undefined;
  states: ReadonlyArray<State<P>>;
  transitions: ReadonlyArray<Transition<P>>;
}

interface IStateNode<P extends Payload> {
  state: State<P>;
  /**
   * Outgoing transitions by transition name.
   */
  transitions: Map<string, Transition<P>>;
  /**
   * Outgoing transitions by destination state name.
   */
  destinations: Map<string, Transition<P>>;
}

export class StateMachine<P extends Payload = Payload> {
  protected _current: string;
  protected _id: string;
  protected _logger: Logger;
  protected _nodes = new Map<string, IStateNode<P>>();

  constructor(parameters: IStateMachineParameters<P>) {
    this._id = parameters.id ?? 'fsm';
    this._logger = (parameters.logger ?? defaultLogger).child({
      fsm: this._id,
    });

    for (const state of parameters.states) {
      this.addState(state);
    }

    for (const transition of parameters.transitions) {
      this.addTransition(transition);
    }

    this._current = this.resolveInitial(parameters.initial);

    this._logger.debug(
      {
        initial: this._current,
        states: parameters.states.length,
        transitions: parameters.transitions.length,
      },
      'State machine created',
    );
  }

  get current(): string {
    return this._current;
  }

  get id(): string {
    return this._id;
  }

  get states(): Array<State<P>> {
    return [...this._nodes.values()].map(({ state }) => state);
  }

  public getState(name: string): State<P> | undefined {
    return this._nodes.get(name)?.state;
  }

  /**
   * Outgoing transitions of the given state, or of the current one.
   */
  public transitionsFrom(
    name: string = this._current,
  ): Array<Transition<P>> {
    return [...(this._nodes.get(name)?.transitions.values() ?? [])];
  }

  /**
   * Checks if the state machine is in the given state.
   */
  public is(name: string): boolean {
    return this._current === name;
  }

  /**
   * Checks if the transition can be executed from the current state.
   */
  public can(transition: string): boolean {
    return this.currentNode().transitions.has(transition);
  }

  public canTransitionTo(destination: string): boolean {
    return this.currentNode().destinations.has(destination);
  }

  /**
   * A final state is a state without outgoing transitions.
   */
  public isFinal(): boolean {
    return this.currentNode().transitions.size === 0;
  }

  /**
   * Executes the transition with the given name from the current state.
   *
   * @throws {UnknownTransitionError} if the current state has no such transition.
   */
  public transition(name: string, payload: Partial<P> = {}): this {
    const transition = this.currentNode().transitions.get(name);
    if (!transition) {
      this._logger.debug(
        { transition: name, current: this._current },
        'Transition rejected',
      );
      throw new UnknownTransitionError(this._id, this._current, {
        transition: name,
      });
    }

    this.execute(transition, payload);
    return this;
  }

  /**
   * Executes the transition leading directly from the current state to `destination`.
   *
   * @throws {UnknownStateError} if `destination` is not registered.
   * @throws {UnknownTransitionError} if there is no direct edge to `destination`.
   */
  public transitionTo(destination: string, payload: Partial<P> = {}): this {
    if (!this._nodes.has(destination)) {
      this._logger.debug(
        { to: destination, current: this._current },
        'Transition rejected',
      );
      throw new UnknownStateError(this._id, destination);
    }

    const transition = this.currentNode().destinations.get(destination);
    if (!transition) {
      this._logger.debug(
        { to: destination, current: this._current },
        'Transition rejected',
      );
      throw new UnknownTransitionError(this._id, this._current, {
        to: destination,
      });
    }

    this.execute(transition, payload);
    return this;
  }

  private addState(state: State<P>) {
    if (this._nodes.has(state.name)) {
      throw new DuplicateStateError(this._id, state.name);
    }

    this._nodes.set(state.name, {
      state,
      transitions: new Map(),
      destinations: new Map(),
    });
  }

  private addTransition(transition: Transition<P>) {
    const { name, from, to } = transition;

    const source = this._nodes.get(from);
    if (!source) {
      throw new UnknownStateError(this._id, from, name);
    }
    if (!this._nodes.has(to)) {
      throw new UnknownStateError(this._id, to, name);
    }
    if (source.destinations.has(to)) {
      throw new DuplicateEdgeError(this._id, from, to);
    }
    if (source.transitions.has(name)) {
      throw new DuplicateTransitionNameError(this._id, name, from);
    }

    source.transitions.set(name, transition);
    source.destinations.set(to, transition);
  }

  private resolveInitial(initial: string | undefined): string {
    if (!initial || !this._nodes.has(initial)) {
      throw new InvalidInitialStateError(this._id, initial);
    }

    return initial;
  }

  private node(name: string): IStateNode<P> {
    const node = this._nodes.get(name);
    if (!node) {
      throw new UnknownStateError(this._id, name);
    }

    return node;
  }

  private currentNode(): IStateNode<P> {
    return this.node(this._current);
  }

  /**
   * Runs exit, transition and entry hooks in that order and only then moves
   * `current`. A throwing hook leaves `current` untouched. Each hook gets its
   * own shallow copy of the payload.
   */
  private execute(transition: Transition<P>, payload: Partial<P>) {
    const source = this.node(transition.from);
    const destination = this.node(transition.to);

    this._logger.debug(
      { transition: transition.name, from: transition.from, to: transition.to },
      'Executing transition',
    );

    source.state.exit({ ...payload });
    transition.run({ ...payload });
    destination.state.enter({ ...payload });

    this._current = destination.state.name;
  }
}
