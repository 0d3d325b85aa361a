export type {
  HighscoreEntryDto,
  HighscoreFileDto,
  SessionConfigDto,
} from './api';
export type {
  BookChunking,
  BundledWordListId,
  CharacterClassification,
  HighscoreDecision,
  HighscoreEntry,
  HighscoreMapper,
  Leaderboard,
  LeaderboardMap,
  SessionConfig,
  SessionCounters,
  SessionEndReason,
  SessionMode,
  SessionResult,
  SessionSnapshot,
  SessionStatus,
  WordAttempt,
  WordListId,
  WordListSelection,
} from './domain';
export type { InputMode, MenuChoice, SegmentStyle, WordSegment } from './ui';
