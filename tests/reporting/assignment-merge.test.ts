import { describe, it, expect } from "vitest";
import { loadMergedAssignments, mergeAssignments } from "../../src/reporting/assignment-merge.js";
import type { Assignment } from "../../src/canvas/types.js";
import type { SelectedCourse } from "../../src/reporting/types.js";
import { criterion } from "../helpers/fake-canvas.js";
import { twoSectionCanvas, SECTION_1, SECTION_2 } from "../helpers/fixtures.js";

const sec1: SelectedCourse = { id: 101, name: "Sec 1", courseCode: "X-01", termName: null };
const sec2: SelectedCourse = { id: 102, name: "Sec 2", courseCode: "X-02", termName: null };

function assignment(id: number, courseId: number, name: string, extra: Partial<Assignment> = {}): Assignment {
  return { id, name, course_id: courseId, points_possible: 10, ...extra };
}

describe("mergeAssignments", () => {
  it("merges same-named assignments across sections in first-seen order", () => {
    const merged = mergeAssignments([
      {
        course: sec1,
        assignments: [
          assignment(1, 101, "Quiz 1", { points_possible: 20, quiz_id: 11 }),
          assignment(2, 101, "Essay", { points_possible: null }),
        ],
      },
      {
        course: sec2,
        assignments: [
          assignment(21, 102, "Quiz 1", { points_possible: 25, quiz_id: 31 }),
          assignment(22, 102, "Final"),
        ],
      },
    ]);

    expect(merged.map((a) => a.name)).toEqual(["Quiz 1", "Essay", "Final"]);
    expect(merged[0]).toEqual({
      id: 1,
      name: "Quiz 1",
      pointsPossible: 20,
      courseName: "Sec 1",
      courseIds: [101, 102],
      assignmentIdsByCourse: { "101": 1, "102": 21 },
      quizIdsByCourse: { "101": 11, "102": 31 },
      hasRubric: false,
      isQuiz: true,
    });
    expect(merged[1].pointsPossible).toBe(0);
    expect(merged[2].courseIds).toEqual([102]);
  });

  it("keeps the first of two same-named assignments in one course", () => {
    const merged = mergeAssignments([
      {
        course: sec1,
        assignments: [assignment(1, 101, "Quiz"), assignment(2, 101, "Quiz", { points_possible: 99 })],
      },
    ]);

    expect(merged).toHaveLength(1);
    expect(merged[0].assignmentIdsByCourse).toEqual({ "101": 1 });
    expect(merged[0].pointsPossible).toBe(10);
  });

  it("flags a rubric or quiz present in any section", () => {
    const merged = mergeAssignments([
      { course: sec1, assignments: [assignment(1, 101, "Project", { rubric: [] })] },
      {
        course: sec2,
        assignments: [assignment(21, 102, "Project", { rubric: [criterion("r1", "Design", 5)], quiz_id: 40 })],
      },
    ]);

    expect(merged[0].hasRubric).toBe(true);
    expect(merged[0].isQuiz).toBe(true);
    expect(merged[0].quizIdsByCourse).toEqual({ "101": null, "102": 40 });
  });

  it("names untitled assignments Unnamed", () => {
    const merged = mergeAssignments([{ course: sec1, assignments: [assignment(9, 101, "")] }]);
    expect(merged[0].name).toBe("Unnamed");
  });
});

describe("loadMergedAssignments", () => {
  it("loads every selected course and merges the result", async () => {
    const canvas = twoSectionCanvas();
    const courses: SelectedCourse[] = [
      { id: SECTION_1, name: "Sec 1", courseCode: "", termName: null },
      { id: SECTION_2, name: "Sec 2", courseCode: "", termName: null },
    ];

    const merged = await loadMergedAssignments(canvas, courses);

    expect(merged.map((a) => [a.name, a.courseIds])).toEqual([
      ["Midterm Quiz", [101, 102]],
      ["Lab Report", [101, 102]],
      ["Participation", [101, 102]],
    ]);
    expect(canvas.calls).toEqual(["getAssignments:101", "getAssignments:102"]);
  });
});
