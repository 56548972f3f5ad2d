import type { TemplateAssignment, TemplateOutcome } from "../../src/templates/types.js";
import { FakeCanvas, criterion } from "./fake-canvas.js";

export const SECTION_1 = 101;
export const SECTION_2 = 102;

// Students: Avery (1) and Blake (2) in section 1, Casey (3) in section 2
export const AVERY = 1;
export const BLAKE = 2;
export const CASEY = 3;

/**
 * Two sections of one course with a grouped quiz, a rubric-graded lab report
 * and a plain participation grade.
 */
export function twoSectionCanvas(): FakeCanvas {
  const canvas = new FakeCanvas()
    .addCourse(SECTION_1, "PSY 3421 Research Methods (Sec 1)", "PSY3421-01", "Fall 2025")
    .addCourse(SECTION_2, "PSY 3421 Research Methods (Sec 2)", "PSY3421-02", "Fall 2025")
    .addStudent(SECTION_1, AVERY, "Avery Stone", "Stone, Avery")
    .addStudent(SECTION_1, BLAKE, "Blake Rivers", "Rivers, Blake")
    .addStudent(SECTION_2, CASEY, "Casey Moore", "Moore, Casey");

  // Section 1
  canvas
    .addAssignment(SECTION_1, 1, "Midterm Quiz", { points: 20, quizId: 11 })
    .addAssignment(SECTION_1, 2, "Lab Report", {
      points: 30,
      rubric: [criterion("c1", "Hypothesis", 10), criterion("c2", "Analysis", 20)],
    })
    .addAssignment(SECTION_1, 3, "Participation", { points: 10 })
    .addQuizQuestions(SECTION_1, 11, [5, 5, 6, 6])
    .addQuizGroup(SECTION_1, 11, 5, "Recall", 2, 2)
    .addQuizGroup(SECTION_1, 11, 6, "Application", 2, 3);

  // Section 2 copies, with a differently cased criterion
  canvas
    .addAssignment(SECTION_2, 21, "Midterm Quiz", { points: 20, quizId: 31 })
    .addAssignment(SECTION_2, 22, "Lab Report", {
      points: 30,
      rubric: [criterion("d1", "hypothesis", 10), criterion("d2", "Analysis", 20)],
    })
    .addAssignment(SECTION_2, 23, "Participation", { points: 10 })
    .addQuizQuestions(SECTION_2, 31, [7, 7, 8, 8])
    .addQuizGroup(SECTION_2, 31, 7, "Recall", 2, 2)
    .addQuizGroup(SECTION_2, 31, 8, "Application", 2, 3);

  // Grades
  canvas
    .addSubmission(SECTION_1, 3, AVERY, 8)
    .addSubmission(SECTION_1, 3, BLAKE, 10)
    .addSubmission(SECTION_2, 23, CASEY, 4)
    // Avery is not enrolled in section 2; this must be ignored
    .addSubmission(SECTION_2, 23, AVERY, 0)
    .addSubmission(SECTION_1, 2, AVERY, 25, { rubric: { c1: { points: 9 }, c2: { points: 16 } } })
    .addSubmission(SECTION_1, 2, BLAKE, 20, { rubric: { c1: { points: 5 }, c2: { points: 15 } } })
    .addSubmission(SECTION_2, 22, CASEY, 12, { rubric: { d1: { points: 10 }, d2: { points: 2 } } })
    .addSubmission(SECTION_1, 1, AVERY, 16)
    .addSubmission(SECTION_1, 1, BLAKE, null, { state: "unsubmitted" })
    .addSubmission(SECTION_2, 21, CASEY, 20);

  // Quiz answers as [group id, correct]
  canvas
    .addQuizAttempt(SECTION_1, 11, AVERY, 501, [[5, true], [5, false], [6, "true"], [6, true]])
    .addQuizAttempt(SECTION_1, 11, BLAKE, 502, [[5, true], [5, true], [6, false], [6, false]])
    .addQuizAttempt(SECTION_2, 31, CASEY, 503, [[7, true], [7, true], [8, true], [8, false]]);

  return canvas;
}

export function templateAssignment(
  name: string,
  options: Partial<Omit<TemplateAssignment, "name" | "questionGroups" | "rubricCriteria">> & {
    groups?: string[];
    criteria?: string[];
  } = {},
): TemplateAssignment {
  return {
    name,
    assignmentType: options.assignmentType ?? "assignment",
    included: options.included ?? true,
    weight: options.weight ?? 1,
    questionGroups: (options.groups ?? []).map((g) => ({ name: g, selected: true })),
    rubricCriteria: (options.criteria ?? []).map((c) => ({ description: c, selected: true })),
  };
}

export function templateOutcome(
  title: string,
  threshold: number,
  assignments: TemplateAssignment[],
  options: { included?: boolean; description?: string } = {},
): TemplateOutcome {
  return {
    title,
    description: options.description ?? `${title} outcome`,
    threshold,
    included: options.included ?? true,
    assignments,
  };
}

/**
 * "Scientific Reasoning" scores the Hypothesis criterion and the Application
 * question group; "Participation" scores two whole assignments, the quiz at
 * double weight.
 */
export function sampleOutcomes(): TemplateOutcome[] {
  return [
    templateOutcome("Scientific Reasoning", 70, [
      templateAssignment("Lab Report", { criteria: ["Hypothesis"] }),
      templateAssignment("Midterm Quiz", { assignmentType: "quiz", groups: ["Application"] }),
    ]),
    templateOutcome("Participation", 85, [
      templateAssignment("Participation"),
      templateAssignment("Midterm Quiz", { assignmentType: "quiz", weight: 2 }),
    ]),
  ];
}
