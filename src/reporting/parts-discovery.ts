/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import { ApiError } from "../api/index.js";
import type { CanvasDataSource } from "../canvas/service.js";
import type { QuizGroup, RubricCriterion } from "../canvas/types.js";
import { log } from "../utils/logger.js";
import type {
  DiscoveredParts,
  MergedAssignment,
  PartsKind,
  QuizGroupPart,
  RubricCriterionPart,
} from "./types.js";

type PartsSource = Pick<CanvasDataSource, "getAssignment" | "getQuizQuestions" | "getQuizGroup">;

export const UNNAMED_CRITERION = "Unnamed Criterion";

/** Question-group name that selects every question of a quiz. */
export const ALL_QUESTIONS = "All Questions";

/**
 * Rubric criteria across every section's copy of the assignment, merged by
 * trimmed description. Points come from the first section that has the criterion.
 */
export async function discoverRubricCriteria(
  source: PartsSource,
  assignment: MergedAssignment,
): Promise<RubricCriterionPart[]> {
  const byDescription = new Map<string, RubricCriterionPart>();

  for (const courseId of assignment.courseIds) {
    const courseKey = String(courseId);
    const courseAssignmentId = assignment.assignmentIdsByCourse[courseKey] ?? assignment.id;

    let rubric: RubricCriterion[];
    try {
      rubric = (await source.getAssignment(courseId, courseAssignmentId)).rubric ?? [];
    } catch (error) {
      if (!(error instanceof ApiError)) throw error;
      log("WARN", `Skipping rubric of "${assignment.name}" in course ${courseId}: ${error.message}`);
      continue;
    }

    for (const criterion of rubric) {
      const description = criterion.description?.trim() || UNNAMED_CRITERION;
      let part = byDescription.get(description);
      if (!part) {
        part = {
          type: "rubric_criterion",
          description,
          points: criterion.points ?? 0,
          criterionIdsByCourse: {},
        };
        byDescription.set(description, part);
      }
      if (!(courseKey in part.criterionIdsByCourse)) {
        part.criterionIdsByCourse[courseKey] = criterion.id;
      }
    }
  }

  return [...byDescription.values()];
}

/**
 * Question groups of every section's quiz, merged by group name.
 * Groups that cannot be fetched are skipped with a warning.
 */
export async function discoverQuestionGroups(
  source: PartsSource,
  assignment: MergedAssignment,
): Promise<QuizGroupPart[]> {
  const byName = new Map<string, QuizGroupPart>();

  for (const courseId of assignment.courseIds) {
    const courseKey = String(courseId);
    const quizId = assignment.quizIdsByCourse[courseKey];
    if (quizId === null || quizId === undefined) continue;

    const questions = await source.getQuizQuestions(courseId, quizId);
    const groupIds = new Set<number>();
    for (const question of questions) {
      if (question.quiz_group_id) groupIds.add(question.quiz_group_id);
    }

    for (const groupId of groupIds) {
      let group: QuizGroup;
      try {
        group = await source.getQuizGroup(courseId, quizId, groupId);
      } catch (error) {
        if (!(error instanceof ApiError)) throw error;
        log("WARN", `Skipping question group ${groupId} of quiz ${quizId}: ${error.message}`);
        continue;
      }

      const name = group.name || `Group ${groupId}`;
      let part = byName.get(name);
      if (!part) {
        part = {
          type: "quiz_group",
          name,
          groupIdsByCourse: {},
          pickCountByCourse: {},
          questionPointsByCourse: {},
        };
        byName.set(name, part);
      }
      part.groupIdsByCourse[courseKey] = groupId;
      part.pickCountByCourse[courseKey] = group.pick_count ?? 0;
      part.questionPointsByCourse[courseKey] = group.question_points ?? 0;
    }
  }

  return [...byName.values()];
}

export async function discoverParts(
  source: PartsSource,
  assignment: MergedAssignment,
): Promise<DiscoveredParts> {
  const rubricCriteria = assignment.hasRubric ? await discoverRubricCriteria(source, assignment) : [];
  const questionGroups = assignment.isQuiz ? await discoverQuestionGroups(source, assignment) : [];

  let kind: PartsKind = "whole";
  if (assignment.isQuiz && assignment.hasRubric) kind = "quiz_and_rubric";
  else if (assignment.isQuiz) kind = "quiz";
  else if (assignment.hasRubric) kind = "rubric";

  return {
    assignmentName: assignment.name,
    kind,
    questionGroups,
    rubricCriteria,
    offersAllQuestions: assignment.isQuiz && questionGroups.length === 0,
  };
}
