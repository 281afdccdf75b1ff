import { STAGES, type Report, type Stage } from "@biomeai/shared";

export type PredictionKind = "diet" | "energy" | "digestive";

/** What a user message receives at each stage of the scripted flow. */
export type ReplyPlan =
  | { kind: "upload_required" }
  | { kind: "prediction"; prediction: PredictionKind; answerKey: string; enters: Stage }
  | { kind: "summary"; answerKey: string; enters: Stage }
  | { kind: "freeform"; enters: Stage | null };

export function stageIndex(stage: Stage): number {
  return STAGES.indexOf(stage);
}

/** The stage after `stage`; free-form Q&A is terminal and loops on itself. */
export function nextStage(stage: Stage): Stage {
  const index = stageIndex(stage);
  return STAGES[Math.min(index + 1, STAGES.length - 1)];
}

/** Transitions move exactly one stage forward. */
export function canTransition(from: Stage, to: Stage): boolean {
  return to !== from && nextStage(from) === to;
}

/** The conversation stage is stored on the report and advanced explicitly. */
export function detectStage(report: Pick<Report, "stage">): Stage {
  return report.stage;
}

export function replyPlan(stage: Stage): ReplyPlan {
  switch (stage) {
    case "awaiting_upload":
      return { kind: "upload_required" };
    case "awaiting_date_or_antibiotics":
      return {
        kind: "prediction",
        prediction: "diet",
        answerKey: "antibiotics_response",
        enters: "awaiting_diet_confirmation",
      };
    case "awaiting_diet_confirmation":
      return {
        kind: "prediction",
        prediction: "energy",
        answerKey: "diet_response",
        enters: "awaiting_energy_confirmation",
      };
    case "awaiting_energy_confirmation":
      return {
        kind: "prediction",
        prediction: "digestive",
        answerKey: "energy_response",
        enters: "awaiting_digestive_confirmation",
      };
    case "awaiting_digestive_confirmation":
      return { kind: "summary", answerKey: "digestive_response", enters: "summary_delivered" };
    case "summary_delivered":
      // Follow-ups were interrupted; the next answer closes the scripted flow
      return { kind: "freeform", enters: "freeform_qa" };
    case "freeform_qa":
      return { kind: "freeform", enters: null };
  }
}
