import { InvalidStateError } from '@/lib/errors';
import type { SessionEndReason, SessionStatus } from '@/types';

export interface SessionMachineState {
  status: SessionStatus;
  endReason: SessionEndReason | null;
}

export type SessionAction =
  | { type: 'START' }
  | { type: 'FINISH'; reason: Exclude<SessionEndReason, 'aborted'> }
  | { type: 'ABORT' };

export const INITIAL_SESSION_STATE: SessionMachineState = { status: 'pending', endReason: null };

export function sessionReducer(state: SessionMachineState, action: SessionAction): SessionMachineState {
  switch (action.type) {
    case 'START':
      if (state.status !== 'pending') {
        throw new InvalidStateError(`Cannot start a session that is ${state.status}`, state.status);
      }
      return { status: 'active', endReason: null };
    case 'FINISH':
      if (state.status !== 'active') {
        throw new InvalidStateError(`Cannot finish a session that is ${state.status}`, state.status);
      }
      return { status: 'finished', endReason: action.reason };
    case 'ABORT':
      if (state.status === 'finished') {
        throw new InvalidStateError('Cannot abort a finished session', state.status);
      }
      return { status: 'finished', endReason: 'aborted' };
    default:
      return state;
  }
}
