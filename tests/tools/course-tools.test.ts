import { describe, it, expect, afterEach } from "vitest";
import { searchCourses } from "../../src/tools/search-courses.js";
import { listAssignments } from "../../src/tools/list-assignments.js";
import { getAssignmentParts } from "../../src/tools/get-assignment-parts.js";
import { ReportError } from "../../src/utils/errors.js";
import { twoSectionCanvas, SECTION_1, SECTION_2 } from "../helpers/fixtures.js";
import { makeToolContext, type TestToolContext } from "../helpers/tool-context.js";

describe("course tools", () => {
  let ctx: TestToolContext | undefined;

  afterEach(async () => {
    await ctx?.cleanup();
    ctx = undefined;
  });

  describe("searchCourses", () => {
    it("filters by course code and formats each match", async () => {
      const canvas = twoSectionCanvas().addCourse(201, "BIO 1101 Biology", "BIO1101", "Spring 2026");
      ctx = await makeToolContext(canvas);

      const courses = await searchCourses(ctx, { courseCode: "psy" });

      expect(courses.map((c) => c.id)).toEqual([SECTION_1, SECTION_2]);
      expect(courses[0]).toEqual({
        id: SECTION_1,
        name: "PSY 3421 Research Methods (Sec 1)",
        courseCode: "PSY3421-01",
        term: "Fall 2025",
        totalStudents: null,
        display: "PSY 3421 Research Methods (Sec 1) (Fall 2025)",
      });
    });

    it("applies the configured exclusions", async () => {
      ctx = await makeToolContext(twoSectionCanvas(), { CANVAS_EXCLUDE_COURSES: "102" });

      const courses = await searchCourses(ctx, { semester: "Fall" });

      expect(courses.map((c) => c.id)).toEqual([SECTION_1]);
    });

    it("uses the configured admin mode unless the call overrides it", async () => {
      const canvas = twoSectionCanvas();
      ctx = await makeToolContext(canvas, { CANVAS_ADMIN_MODE: "true" });

      await searchCourses(ctx, {});
      expect(canvas.lastCoursesOptions).toEqual({ adminMode: true });

      await searchCourses(ctx, { adminMode: false });
      expect(canvas.lastCoursesOptions).toEqual({ adminMode: false });
    });
  });

  describe("listAssignments", () => {
    it("lists merged assignments with their section counts", async () => {
      ctx = await makeToolContext(twoSectionCanvas());

      const listing = await listAssignments(ctx, [SECTION_1, SECTION_2]);

      expect(listing.courses.map((c) => c.courseCode)).toEqual(["PSY3421-01", "PSY3421-02"]);
      expect(listing.assignments).toEqual([
        {
          name: "Midterm Quiz",
          pointsPossible: 20,
          courseName: "PSY 3421 Research Methods (Sec 1)",
          courseIds: [SECTION_1, SECTION_2],
          sectionCount: 2,
          isQuiz: true,
          hasRubric: false,
        },
        {
          name: "Lab Report",
          pointsPossible: 30,
          courseName: "PSY 3421 Research Methods (Sec 1)",
          courseIds: [SECTION_1, SECTION_2],
          sectionCount: 2,
          isQuiz: false,
          hasRubric: true,
        },
        {
          name: "Participation",
          pointsPossible: 10,
          courseName: "PSY 3421 Research Methods (Sec 1)",
          courseIds: [SECTION_1, SECTION_2],
          sectionCount: 2,
          isQuiz: false,
          hasRubric: false,
        },
      ]);
    });
  });

  describe("getAssignmentParts", () => {
    it("lists question groups with the first section's settings", async () => {
      ctx = await makeToolContext(twoSectionCanvas());

      const listing = await getAssignmentParts(ctx, [SECTION_1, SECTION_2], "Midterm Quiz");

      expect(listing).toEqual({
        assignmentName: "Midterm Quiz",
        kind: "quiz",
        questionGroups: [
          { name: "Recall", sectionCount: 2, pickCount: 2, questionPoints: 2 },
          { name: "Application", sectionCount: 2, pickCount: 2, questionPoints: 3 },
        ],
        rubricCriteria: [],
        offersAllQuestions: false,
      });
    });

    it("lists rubric criteria per section", async () => {
      ctx = await makeToolContext(twoSectionCanvas());

      const listing = await getAssignmentParts(ctx, [SECTION_1, SECTION_2], "Lab Report");

      expect(listing.kind).toBe("rubric");
      expect(listing.rubricCriteria).toEqual([
        { description: "Hypothesis", points: 10, sectionCount: 1 },
        { description: "Analysis", points: 20, sectionCount: 2 },
        { description: "hypothesis", points: 10, sectionCount: 1 },
      ]);
      expect(listing.note).toBeUndefined();
    });

    it("explains that plain assignments are scored whole", async () => {
      ctx = await makeToolContext(twoSectionCanvas());

      const listing = await getAssignmentParts(ctx, [SECTION_1], "Participation");

      expect(listing.kind).toBe("whole");
      expect(listing.note).toBe(
        "This assignment has no quiz question groups or rubric; the entire assignment score is used.",
      );
    });

    it("notes quizzes that only offer All Questions", async () => {
      const canvas = twoSectionCanvas();
      canvas.addAssignment(SECTION_1, 4, "Pop Quiz", { quizId: 12 }).addQuizQuestions(SECTION_1, 12, [null]);
      ctx = await makeToolContext(canvas);

      const listing = await getAssignmentParts(ctx, [SECTION_1], "Pop Quiz");

      expect(listing.offersAllQuestions).toBe(true);
      expect(listing.note).toBe(
        "This quiz has no question groups; only the whole quiz (All Questions) can be used.",
      );
    });

    it("rejects an assignment name that is not in the sections", async () => {
      ctx = await makeToolContext(twoSectionCanvas());

      await expect(getAssignmentParts(ctx, [SECTION_1], "Final Exam")).rejects.toThrow(
        new ReportError('Assignment "Final Exam" was not found in the selected courses'),
      );
    });
  });
});
