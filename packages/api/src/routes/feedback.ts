import type { FastifyInstance } from "fastify";

import { ValidationError, type FeedbackScale } from "@banking-agent/shared";

import {
  collectFields,
  optionalBoolean,
  optionalString,
  requireBody,
  requireBoolean,
  requireNumber,
  requireString,
  type Fields,
} from "../lib/params.js";
import type { RouteDeps } from "../server.js";

function parseScale(fields: Fields): FeedbackScale {
  const scale = optionalString(fields, "scale") ?? "five_point";
  if (scale !== "five_point" && scale !== "unit") {
    throw new ValidationError("scale must be one of: five_point, unit");
  }
  return scale;
}

function parseTimestamp(fields: Fields): string {
  const raw = optionalString(fields, "timestamp");
  if (raw === undefined) return new Date().toISOString();
  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError("Invalid 'timestamp' parameter: must be ISO date string");
  }
  return date.toISOString();
}

export async function feedbackRoutes(fastify: FastifyInstance, { deps }: RouteDeps): Promise<void> {
  const { feedback } = deps;

  fastify.post("/feedback/satisfaction", async (request) => {
    const body = requireBody(request.body);
    const scale = parseScale(body);
    const score = requireNumber(body, "satisfactionScore");
    if (scale === "five_point" && (score < 1 || score > 5)) {
      throw new ValidationError("satisfactionScore must be between 1 and 5");
    }
    if (scale === "unit" && (score < 0 || score > 1)) {
      throw new ValidationError("satisfactionScore must be between 0 and 1");
    }

    const receipt = feedback.recordSatisfaction({
      sessionId: requireString(body, "sessionId"),
      accountRef: optionalString(body, "accountNumber"),
      provider: requireString(body, "llmProvider"),
      intent: requireString(body, "intent"),
      score,
      scale,
      feedback: optionalString(body, "feedback"),
      wasHelpful: optionalBoolean(body, "wasHelpful"),
      wasAccurate: optionalBoolean(body, "wasAccurate"),
      timestamp: parseTimestamp(body),
    });
    return { ok: true, message: "Thank you for your feedback!", ...receipt };
  });

  fastify.post("/feedback/quick-feedback", async (request) => {
    const fields = collectFields(request.query, request.body);
    const receipt = feedback.recordQuickFeedback({
      sessionId: requireString(fields, "sessionId"),
      provider: requireString(fields, "llmProvider"),
      intent: requireString(fields, "intent"),
      helpful: requireBoolean(fields, "helpful"),
    });
    return { ok: true, message: "Feedback recorded", ...receipt };
  });

  fastify.post("/feedback/report-issue", async (request) => {
    const fields = collectFields(request.query, request.body);
    const receipt = feedback.recordIssue({
      sessionId: requireString(fields, "sessionId"),
      provider: requireString(fields, "llmProvider"),
      intent: requireString(fields, "intent"),
      issueType: requireString(fields, "issueType"),
      description: optionalString(fields, "description"),
    });
    return { ok: true, message: "Issue reported. Thank you for helping us improve!", ...receipt };
  });
}
