import { StateMachine, StateMachineBuilder, isStateMachineError } from '../..';

enum TurnstileState {
  Locked = 'locked',
  Unlocked = 'unlocked',
  Broken = 'broken',
}

enum TurnstileEvent {
  Coin = 'coin',
  Push = 'push',
  Fail = 'fail',
  Fix = 'fix',
}

interface ITurnstilePayload extends Record<string, unknown> {
  coins: number;
}

interface ITurnstile {
  coins: number;
  passed: number;
  alarms: number;
  fsm: StateMachine<ITurnstilePayload>;
}

const createTurnstile = (): ITurnstile => {
  const builder = new StateMachineBuilder<ITurnstilePayload>({
    id: 'turnstile',
  });
  const turnstile = { coins: 0, passed: 0, alarms: 0 };

  builder.addNamedState(TurnstileState.Locked);
  builder.addNamedState(TurnstileState.Unlocked, {
    onExit() {
      turnstile.passed += 1;
    },
  });
  builder.addNamedState(TurnstileState.Broken, {
    onEntry() {
      turnstile.alarms += 1;
    },
  });

  builder.addNamedTransition(
    TurnstileEvent.Coin,
    TurnstileState.Locked,
    TurnstileState.Unlocked,
    ({ coins = 1 }) => {
      turnstile.coins += coins;
    },
  );
  builder.addNamedTransition(
    TurnstileEvent.Push,
    TurnstileState.Unlocked,
    TurnstileState.Locked,
  );
  builder.addNamedTransition(
    TurnstileEvent.Fail,
    TurnstileState.Locked,
    TurnstileState.Broken,
  );
  builder.addNamedTransition(
    TurnstileEvent.Fix,
    TurnstileState.Broken,
    TurnstileState.Locked,
  );
  builder.setInitialState(TurnstileState.Locked);

  return Object.assign(turnstile, { fsm: builder.build() });
};

describe('Turnstile', () => {
  it('should let one person through per coin', () => {
    const turnstile = createTurnstile();

    turnstile.fsm.transition(TurnstileEvent.Coin, { coins: 2 });
    turnstile.fsm.transition(TurnstileEvent.Push);

    expect(turnstile.fsm.is(TurnstileState.Locked)).toBe(true);
    expect(turnstile.coins).toBe(2);
    expect(turnstile.passed).toBe(1);
  });

  it('should refuse to push when locked', () => {
    const turnstile = createTurnstile();

    expect(turnstile.fsm.can(TurnstileEvent.Push)).toBe(false);

    try {
      turnstile.fsm.transition(TurnstileEvent.Push);
    } catch (error) {
      expect(isStateMachineError(error)).toBe(true);
    }

    expect(turnstile.passed).toBe(0);
    expect.assertions(3);
  });

  it('should go through repair by destination', () => {
    const turnstile = createTurnstile();

    turnstile.fsm.transitionTo(TurnstileState.Broken);
    expect(turnstile.alarms).toBe(1);
    expect(turnstile.fsm.canTransitionTo(TurnstileState.Unlocked)).toBe(false);

    turnstile.fsm.transitionTo(TurnstileState.Locked);
    turnstile.fsm.transitionTo(TurnstileState.Unlocked);

    expect(turnstile.fsm.current).toBe(TurnstileState.Unlocked);
    expect(turnstile.coins).toBe(1);
  });
});
