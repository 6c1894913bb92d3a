import {
  createLogger,
  type FeedbackRecord,
  type FeedbackScale,
  type IssueReport,
  type QuickFeedback,
} from "@banking-agent/shared";
import {
  boundedIntentLabel,
  boundedProviderLabel,
  InstrumentationError,
  recordBusinessEvent,
  recordCorrectness,
  type Telemetry,
} from "@banking-agent/telemetry";

const log = createLogger({ component: "feedback" });

export const SATISFACTION_EVENT = "user_satisfaction_submitted";
export const QUICK_FEEDBACK_EVENT = "quick_feedback_submitted";
export const ISSUE_REPORTED_EVENT = "issue_reported";

export interface FeedbackReceipt {
  /** Correctness score recorded, in [0, 1]. */
  correctness: number;
  recordedAt: string;
}

export function normalizeScore(score: number, scale: FeedbackScale): number {
  const unit = scale === "unit" ? score : score / 5;
  if (!Number.isFinite(unit)) return 0;
  return Math.min(1, Math.max(0, unit));
}

/**
 * Turns user feedback into correctness telemetry. Recording never fails the
 * caller; emission faults are logged.
 */
export function createFeedbackRecorder(telemetry: Telemetry) {
  function safely(step: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      log.warn({ err: new InstrumentationError(step, err) }, "Feedback telemetry failed");
    }
  }

  return {
    recordSatisfaction(record: FeedbackRecord): FeedbackReceipt {
      const correctness = normalizeScore(record.score, record.scale);
      log.info(
        { provider: record.provider, intent: record.intent, score: record.score, scale: record.scale },
        "User satisfaction received",
      );

      recordCorrectness(telemetry, {
        provider: record.provider,
        intent: record.intent,
        score: correctness,
        feedback: record.feedback,
      });
      recordBusinessEvent(telemetry, SATISFACTION_EVENT, {
        provider: record.provider,
        intent: record.intent,
        score: record.score,
        helpful: record.wasHelpful,
        accurate: record.wasAccurate,
        account: record.accountRef,
        session: record.sessionId,
      });
      safely("satisfaction.metrics", () => {
        const labels = {
          provider: boundedProviderLabel(record.provider),
          intent: boundedIntentLabel(record.intent),
        };
        telemetry.metrics.userSatisfactionSubmissionsTotal.inc(labels);
        telemetry.metrics.userSatisfactionScore.set(labels, record.score);
      });

      return { correctness, recordedAt: record.timestamp };
    },

    recordQuickFeedback(input: QuickFeedback): FeedbackReceipt {
      const correctness = input.helpful ? 1 : 0;
      log.info({ provider: input.provider, intent: input.intent, helpful: input.helpful }, "Quick feedback received");

      recordCorrectness(telemetry, {
        provider: input.provider,
        intent: input.intent,
        score: correctness,
        feedback: input.helpful ? "User found response helpful" : "User found response unhelpful",
      });
      recordBusinessEvent(telemetry, QUICK_FEEDBACK_EVENT, {
        provider: input.provider,
        intent: input.intent,
        helpful: input.helpful,
        session: input.sessionId,
      });

      return { correctness, recordedAt: new Date().toISOString() };
    },

    recordIssue(input: IssueReport): FeedbackReceipt {
      log.warn(
        { provider: input.provider, intent: input.intent, issueType: input.issueType },
        "Issue reported on agent response",
      );

      const detail = input.description ? ` - ${input.description}` : "";
      recordCorrectness(telemetry, {
        provider: input.provider,
        intent: input.intent,
        score: 0,
        feedback: `Issue reported: ${input.issueType}${detail}`,
      });
      recordBusinessEvent(telemetry, ISSUE_REPORTED_EVENT, {
        provider: input.provider,
        intent: input.intent,
        issue_type: input.issueType,
        description: input.description,
        session: input.sessionId,
      });

      return { correctness: 0, recordedAt: new Date().toISOString() };
    },
  };
}

export type FeedbackRecorder = ReturnType<typeof createFeedbackRecorder>;
