export class StateMachineError extends Error {
  constructor(
    message: string,
    readonly id: string,
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DuplicateStateError extends StateMachineError {
  constructor(
    id: string,
    readonly state: string,
  ) {
    super(`State ${state} is already registered in ${id}`, id);
  }
}

/**
 * Thrown when a transition references an unregistered state,
 * or when `transitionTo` is called with an unknown destination.
 */
export class UnknownStateError extends StateMachineError {
  constructor(
    id: string,
    readonly state: string,
    readonly transition?: string,
  ) {
    super(
      transition === undefined
        ? `State ${state} is not registered in ${id}`
        : `State ${state} of transition ${transition} is not registered in ${id}`,
      id,
    );
  }
}

export class DuplicateEdgeError extends StateMachineError {
  constructor(
    id: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Transition from ${from} to ${to} already exists in ${id}`, id);
  }
}

export class DuplicateTransitionNameError extends StateMachineError {
  constructor(
    id: string,
    readonly transition: string,
    readonly from: string,
  ) {
    super(
      `Transition ${transition} from state ${from} already exists in ${id}`,
      id,
    );
  }
}

export class InvalidInitialStateError extends StateMachineError {
  constructor(
    id: string,
    readonly initial: string | undefined,
  ) {
    super(
      initial
        ? `Initial state ${initial} is not registered in ${id}`
        : `Initial state of ${id} is not set`,
      id,
    );
  }
}

export class UnknownTransitionError extends StateMachineError {
  constructor(
    id: string,
    readonly current: string,
    readonly target: { transition: string } | { to: string },
  ) {
    super(
      'transition' in target
        ? `Transition ${target.transition} is not allowed in state ${current} of ${id}`
        : `Transition from ${current} to ${target.to} is not found in ${id}`,
      id,
    );
  }
}

export const isStateMachineError = (
  error: unknown,
): error is StateMachineError => error instanceof StateMachineError;
