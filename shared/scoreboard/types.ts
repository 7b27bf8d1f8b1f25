export type TournamentDetails = {
  name: string;
  date: string;
  location: string;
};

export type RoundInfo = string;

export type CourseHole = {
  number: number;
  length: number;
  par: number;
};

export type PlayerRoundRecord = {
  place: string;
  name: string;
  totalScore: string;
  roundScore: string;
  holeScores: string[];
  rating: string;
};

export type HoleStatus = {
  diff: number[];
  label: string[];
};

export type ScoredRecord = PlayerRoundRecord & {
  status: HoleStatus;
};

export type StandingsRow = {
  place: string;
  name: string;
  total: string;
  rd: string;
  holeScores: string[];
};

export type ParseOutcome =
  | { kind: 'record-truncated'; round: number; records: number; tokensLeft: number }
  | { kind: 'course-truncated'; holes: number };

export type ParsedReport = {
  course: CourseHole[];
  rounds: PlayerRoundRecord[][];
  tournament: TournamentDetails;
  roundInfo: RoundInfo;
  outcomes: ParseOutcome[];
};
