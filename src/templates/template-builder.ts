import { ALL_QUESTIONS } from "../reporting/parts-discovery.js";
import type { ResolvedOutcome } from "../reporting/types.js";
import type { CourseTemplate, TemplateOutcome } from "./types.js";

export interface TemplateMeta {
  templateName: string;
  courseCode: string;
  createdBy?: string;
  notes?: string;
}

export function createTemplate(meta: TemplateMeta, outcomes: TemplateOutcome[], now: Date = new Date()): CourseTemplate {
  return {
    templateName: meta.templateName,
    courseCode: meta.courseCode,
    createdDate: now,
    lastModified: now,
    createdBy: meta.createdBy ?? "Unknown",
    notes: meta.notes ?? "",
    outcomes,
  };
}

/**
 * Template from outcomes already matched against live courses. Only names
 * that resolved are recorded.
 */
export function templateFromResolvedOutcomes(
  meta: TemplateMeta,
  resolved: readonly ResolvedOutcome[],
  now: Date = new Date(),
): CourseTemplate {
  const outcomes: TemplateOutcome[] = resolved.map((outcome) => ({
    title: outcome.title,
    description: outcome.description,
    threshold: outcome.threshold,
    included: true,
    assignments: outcome.assignments.map(({ assignment, parts, weight }) => ({
      name: assignment.name,
      assignmentType: assignment.isQuiz ? "quiz" : "assignment",
      included: true,
      weight,
      questionGroups: parts.flatMap((p) => {
        if (p.type === "quiz_group") return [{ name: p.name, selected: true }];
        if (p.type === "all_questions") return [{ name: ALL_QUESTIONS, selected: true }];
        return [];
      }),
      rubricCriteria: parts.flatMap((p) =>
        p.type === "rubric_criterion" ? [{ description: p.description, selected: true }] : [],
      ),
    })),
  }));

  return createTemplate(meta, outcomes, now);
}
