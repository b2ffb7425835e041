/*
 * Game lifecycle state machine (robot3)
 *
 * STATE FLOW:
 * playing → paused (TOGGLE_PAUSE) → playing (TOGGLE_PAUSE)
 * playing → gameOver (TOP_OUT)
 * any → playing (RESTART)
 *
 * gameOver only leaves through RESTART, and paused only through TOGGLE_PAUSE
 * or RESTART. Events with no transition from the current state are ignored by
 * robot3, which is what makes pausing from gameOver a no-op.
 */

import { createMachine, interpret, state, transition } from "robot3";

import { debugLog } from "../utils/debug";

import type {
  Machine,
  MachineState,
  MachineStates,
  Service,
  Transition,
} from "robot3";

export type LifecycleState = "playing" | "paused" | "gameOver";

export type LifecycleEvent =
  | { type: "TOGGLE_PAUSE" }
  | { type: "TOP_OUT" }
  | { type: "RESTART" };

// The lifecycle carries no data of its own
export type LifecycleContext = Record<string, never>;

type LifecycleEventType = LifecycleEvent["type"];

// state() infers its event type from the first transition; widen it to the
// whole event union so the remaining transitions are accepted.
type LifecycleTransition = Transition<LifecycleEventType>;

const createPlayingState = (): MachineState<LifecycleEventType> =>
  state<LifecycleTransition>(
    transition("TOGGLE_PAUSE", "paused"),
    transition("TOP_OUT", "gameOver"),
    transition("RESTART", "playing"),
  );

const createPausedState = (): MachineState<LifecycleEventType> =>
  state<LifecycleTransition>(
    transition("TOGGLE_PAUSE", "playing"),
    transition("RESTART", "playing"),
  );

const createGameOverState = (): MachineState<LifecycleEventType> =>
  state<LifecycleTransition>(transition("RESTART", "playing"));

type LifecycleStatesObject = Record<
  LifecycleState,
  MachineState<LifecycleEventType>
>;
export type LifecycleMachine = Machine<
  LifecycleStatesObject,
  LifecycleContext,
  LifecycleState,
  LifecycleEventType
>;

export const createLifecycleMachine = (): LifecycleMachine => {
  const states = {
    gameOver: createGameOverState(),
    paused: createPausedState(),
    playing: createPlayingState(),
  } as const;

  // robot3 widens the event type to `string` on the way out; the casts pin
  // our state and event unions back onto the machine at this boundary.
  return createMachine(
    "playing" as const,
    states as unknown as MachineStates<LifecycleStatesObject, LifecycleEventType>,
    (): LifecycleContext => ({}),
  ) as unknown as LifecycleMachine;
};

/**
 * Thin wrapper around the robot3 service: sends events and reports whether
 * the state changed. All transition rules live in the machine above.
 */
export class LifecycleService {
  private readonly service: Service<LifecycleMachine>;
  private currentStateName: LifecycleState = "playing";

  constructor() {
    // robot3 calls onChange after every send
    this.service = interpret(createLifecycleMachine(), (service) => {
      this.currentStateName = service.machine.state.name;
    });
  }

  get state(): LifecycleState {
    return this.currentStateName;
  }

  /** Send an event; true when it moved the machine to a different state */
  send(event: LifecycleEvent): boolean {
    const before = this.state;
    this.service.send(event);
    const after = this.state;
    if (before !== after) {
      debugLog("lifecycle", `${before} -> ${after} (${event.type})`);
    }
    return before !== after;
  }
}
