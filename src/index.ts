export { StateMachine, IStateMachineParameters } from './fsm';
export { StateMachineBuilder } from './builder';
export { State, state } from './state';
export { Transition, t } from './transition';
export type { Hook, IStateHooks, IStateMachineOptions, Payload } from './types';
export {
  StateMachineError,
  DuplicateStateError,
  UnknownStateError,
  DuplicateEdgeError,
  DuplicateTransitionNameError,
  InvalidInitialStateError,
  UnknownTransitionError,
  isStateMachineError,
} from './fsm.error';
export { logger } from './logger';
