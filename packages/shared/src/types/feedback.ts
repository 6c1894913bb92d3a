/**
 * `five_point` scores are on the 1-5 satisfaction scale; `unit` scores are
 * already in [0, 1].
 */
export type FeedbackScale = "five_point" | "unit";

export interface FeedbackRecord {
  sessionId: string;
  accountRef?: string;
  provider: string;
  intent: string;
  score: number;
  scale: FeedbackScale;
  feedback?: string;
  wasHelpful?: boolean;
  wasAccurate?: boolean;
  timestamp: string; // ISO
}

export interface QuickFeedback {
  sessionId: string;
  provider: string;
  intent: string;
  helpful: boolean;
}

export interface IssueReport {
  sessionId: string;
  provider: string;
  intent: string;
  issueType: string;
  description?: string;
}
