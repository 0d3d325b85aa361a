export { classifyWord, countCharacters, countWords } from './classify';
export { systemClock, type Clock } from './clock';
export {
  CHARS_PER_WORD,
  computeAccuracy,
  computeConsistency,
  computeNetWpm,
  computeRawWpm,
  computeSessionMetrics,
  roundTo,
  type MetricsInput,
  type SessionMetrics,
} from './metrics';
export {
  INITIAL_SESSION_STATE,
  sessionReducer,
  type SessionAction,
  type SessionMachineState,
} from './session-machine';
export { TypingSession, type TypingSessionOptions } from './typing-session';
