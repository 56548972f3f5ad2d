/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CanvasDataSource } from "../canvas/service.js";
import type { TemplateOutcome } from "../templates/types.js";
import { log } from "../utils/logger.js";
import { ALL_QUESTIONS, discoverQuestionGroups, discoverRubricCriteria } from "./parts-discovery.js";
import type {
  AssignmentPart,
  MergedAssignment,
  OutcomeAssignment,
  QuizGroupPart,
  ResolutionResult,
  ResolvedOutcome,
  RubricCriterionPart,
} from "./types.js";

type ResolverSource = Pick<CanvasDataSource, "getAssignment" | "getQuizQuestions" | "getQuizGroup">;

const normalize = (text: string): string => text.trim().toLowerCase();

/**
 * Map template outcomes (names only) onto the assignments, question groups and
 * rubric criteria of the currently selected sections.
 *
 * Parts are re-discovered from Canvas so ids never come from a template.
 * Anything that cannot be matched is reported in `warnings`.
 */
export async function resolveOutcomes(
  source: ResolverSource,
  mergedAssignments: readonly MergedAssignment[],
  templateOutcomes: readonly TemplateOutcome[],
): Promise<ResolutionResult> {
  const warnings: string[] = [];
  const outcomes: ResolvedOutcome[] = [];

  const byName = new Map<string, MergedAssignment>();
  for (const assignment of mergedAssignments) {
    if (!byName.has(assignment.name)) byName.set(assignment.name, assignment);
  }

  // One discovery per assignment, shared by every outcome that uses it
  const groupCache = new Map<string, Promise<QuizGroupPart[]>>();
  const criteriaCache = new Map<string, Promise<RubricCriterionPart[]>>();
  const groupsFor = (assignment: MergedAssignment): Promise<QuizGroupPart[]> => {
    let pending = groupCache.get(assignment.name);
    if (!pending) {
      pending = assignment.isQuiz ? discoverQuestionGroups(source, assignment) : Promise.resolve([]);
      groupCache.set(assignment.name, pending);
    }
    return pending;
  };
  const criteriaFor = (assignment: MergedAssignment): Promise<RubricCriterionPart[]> => {
    let pending = criteriaCache.get(assignment.name);
    if (!pending) {
      pending = assignment.hasRubric ? discoverRubricCriteria(source, assignment) : Promise.resolve([]);
      criteriaCache.set(assignment.name, pending);
    }
    return pending;
  };

  const seenTitles = new Set<string>();

  for (const outcome of templateOutcomes) {
    if (!outcome.included) continue;

    if (seenTitles.has(outcome.title)) {
      warnings.push(`Outcome "${outcome.title}" appears more than once; only the first is used`);
      continue;
    }
    seenTitles.add(outcome.title);

    const resolved: OutcomeAssignment[] = [];
    const usedNames = new Set<string>();

    for (const templateAssignment of outcome.assignments) {
      if (!templateAssignment.included) continue;

      const assignment = byName.get(templateAssignment.name);
      if (!assignment) {
        warnings.push(
          `Outcome "${outcome.title}": assignment "${templateAssignment.name}" was not found in the selected courses`,
        );
        continue;
      }
      if (usedNames.has(assignment.name)) {
        warnings.push(`Outcome "${outcome.title}": assignment "${assignment.name}" is listed twice; only the first is used`);
        continue;
      }
      usedNames.add(assignment.name);

      const wantedGroups = templateAssignment.questionGroups.filter((g) => g.selected).map((g) => g.name);
      const wantedCriteria = templateAssignment.rubricCriteria
        .filter((c) => c.selected)
        .map((c) => c.description);

      const parts: AssignmentPart[] = [];

      if (wantedGroups.length > 0) {
        const groups = await groupsFor(assignment);
        for (const name of wantedGroups) {
          if (assignment.isQuiz && normalize(name) === normalize(ALL_QUESTIONS)) {
            parts.push({ type: "all_questions" });
            continue;
          }
          const group = groups.find((g) => g.name === name);
          if (group) {
            parts.push(group);
          } else {
            warnings.push(`Outcome "${outcome.title}": question group "${name}" not found in "${assignment.name}"`);
          }
        }
      }

      if (wantedCriteria.length > 0) {
        const criteria = await criteriaFor(assignment);
        for (const description of wantedCriteria) {
          const match = mergeCriteria(
            description.trim(),
            criteria.filter((c) => normalize(c.description) === normalize(description)),
          );
          if (match) {
            parts.push(match);
          } else {
            warnings.push(
              `Outcome "${outcome.title}": rubric criterion "${description.trim()}" not found in "${assignment.name}"`,
            );
          }
        }
      }

      if (wantedGroups.length + wantedCriteria.length > 0 && parts.length === 0) {
        warnings.push(
          `Outcome "${outcome.title}": no selected parts of "${assignment.name}" were found; using the whole assignment score`,
        );
      }

      resolved.push({ assignment, parts, weight: templateAssignment.weight });
    }

    if (resolved.length === 0) {
      warnings.push(`Outcome "${outcome.title}" has no matching assignments and was skipped`);
      continue;
    }

    outcomes.push({
      title: outcome.title,
      description: outcome.description,
      threshold: outcome.threshold,
      assignments: resolved,
    });
  }

  log("INFO", `Resolved ${outcomes.length} outcome(s) with ${warnings.length} warning(s)`);
  return { outcomes, warnings };
}

// Criteria that differ only in case across sections become one part
function mergeCriteria(description: string, matches: RubricCriterionPart[]): RubricCriterionPart | null {
  const [first, ...rest] = matches;
  if (!first) return null;

  const criterionIdsByCourse = { ...first.criterionIdsByCourse };
  let points = first.points;
  for (const other of rest) {
    for (const [courseKey, id] of Object.entries(other.criterionIdsByCourse)) {
      if (!(courseKey in criterionIdsByCourse)) criterionIdsByCourse[courseKey] = id;
    }
    if (points === 0) points = other.points;
  }

  return { type: "rubric_criterion", description, points, criterionIdsByCourse };
}
