import { describe, it, expect, afterEach } from "vitest";
import * as path from "node:path";
import { listTemplates, getTemplate, saveTemplate } from "../../src/tools/manage-templates.js";
import { loadTemplateOutcomes } from "../../src/tools/outcome-source.js";
import { SaveTemplateSchema } from "../../src/tools/schemas.js";
import { createTemplate } from "../../src/templates/template-builder.js";
import { TemplateError } from "../../src/utils/errors.js";
import { twoSectionCanvas, sampleOutcomes, SECTION_1, SECTION_2 } from "../helpers/fixtures.js";
import { makeToolContext, type TestToolContext } from "../helpers/tool-context.js";

const STORE_TIME = "2025-09-01T12:00:00.000Z";

const inlineOutcomes = [
  {
    title: "Scientific Reasoning",
    threshold: 70,
    assignments: [
      { name: "Lab Report", rubricCriteria: [{ description: "Hypothesis" }, { description: "Method" }] },
      { name: "Final Exam" },
    ],
  },
  {
    title: "Participation",
    assignments: [{ name: "Participation" }],
  },
];

describe("template tools", () => {
  let ctx: TestToolContext | undefined;

  afterEach(async () => {
    await ctx?.cleanup();
    ctx = undefined;
  });

  describe("saveTemplate", () => {
    it("saves outcomes as given under an explicit course code", async () => {
      ctx = await makeToolContext(twoSectionCanvas());

      const result = await saveTemplate(
        ctx,
        SaveTemplateSchema.parse({ templateName: "Core", courseCode: "PSY3421", outcomes: inlineOutcomes }),
      );

      expect(result.filePath).toBe(path.join(ctx.config.templateDir, "PSY3421_Core.json"));
      expect(result.warnings).toEqual([]);
      expect(result.template).toMatchObject({
        templateName: "Core",
        courseCode: "PSY3421",
        createdBy: "Unknown",
        lastModified: STORE_TIME,
        outcomeCount: 2,
        outcomeTitles: ["Scientific Reasoning", "Participation"],
      });

      const saved = await getTemplate(ctx, "PSY3421", "Core");
      // threshold falls back to the configured default
      expect(saved.outcomes[1].threshold).toBe(70);
      expect(saved.outcomes[0].assignments.map((a) => a.name)).toEqual(["Lab Report", "Final Exam"]);
    });

    it("keeps only names that match the selected courses", async () => {
      ctx = await makeToolContext(twoSectionCanvas());

      const result = await saveTemplate(
        ctx,
        SaveTemplateSchema.parse({
          templateName: "Core",
          courseIds: [SECTION_1, SECTION_2],
          outcomes: inlineOutcomes,
        }),
      );

      expect(result.template.courseCode).toBe("PSY3421-01");
      expect(result.warnings).toEqual([
        'Outcome "Scientific Reasoning": rubric criterion "Method" not found in "Lab Report"',
        'Outcome "Scientific Reasoning": assignment "Final Exam" was not found in the selected courses',
      ]);

      const saved = await getTemplate(ctx, "PSY3421-01", "Core");
      expect(saved.outcomes[0].assignments).toEqual([
        {
          name: "Lab Report",
          assignmentType: "assignment",
          included: true,
          weight: 1,
          questionGroups: [],
          rubricCriteria: [{ description: "Hypothesis", selected: true }],
        },
      ]);
    });

    it("refuses to save when nothing matched", async () => {
      ctx = await makeToolContext(twoSectionCanvas());

      await expect(
        saveTemplate(
          ctx,
          SaveTemplateSchema.parse({
            templateName: "Core",
            courseIds: [SECTION_1],
            outcomes: [{ title: "Synthesis", assignments: [{ name: "Final Exam" }] }],
          }),
        ),
      ).rejects.toBeInstanceOf(TemplateError);
      expect(await listTemplates(ctx)).toEqual([]);
    });

    it("needs a course code when no courses are given", async () => {
      ctx = await makeToolContext(twoSectionCanvas());

      await expect(
        saveTemplate(ctx, SaveTemplateSchema.parse({ templateName: "Core", courseCode: "  ", outcomes: inlineOutcomes })),
      ).rejects.toThrow("[COR-1006] courseCode is required when courseIds is not given");
    });

    it("keeps the creation date when overwriting", async () => {
      ctx = await makeToolContext(twoSectionCanvas());
      const created = new Date("2024-01-15T08:00:00.000Z");
      await ctx.templates.save(createTemplate({ templateName: "Core", courseCode: "PSY3421" }, [], created));

      const result = await saveTemplate(
        ctx,
        SaveTemplateSchema.parse({ templateName: "Core", courseCode: "PSY3421", outcomes: inlineOutcomes }),
      );

      expect(result.template.createdDate).toBe("2024-01-15T08:00:00.000Z");
      expect(result.template.outcomeCount).toBe(2);
      expect(await listTemplates(ctx, "PSY3421")).toHaveLength(1);
    });
  });

  describe("loadTemplateOutcomes", () => {
    it("prefers inline outcomes", async () => {
      ctx = await makeToolContext(twoSectionCanvas(), { REPORT_DEFAULT_THRESHOLD: "65" });

      const outcomes = await loadTemplateOutcomes(ctx, {
        templateName: "Ignored",
        outcomes: [
          {
            title: "Participation",
            description: "",
            included: true,
            assignments: [
              {
                name: "Participation",
                assignmentType: "assignment",
                included: true,
                weight: 1,
                questionGroups: [],
                rubricCriteria: [],
              },
            ],
          },
        ],
      });

      expect(outcomes.map((o) => [o.title, o.threshold])).toEqual([["Participation", 65]]);
    });

    it("loads a saved template", async () => {
      ctx = await makeToolContext(twoSectionCanvas());
      await ctx.templates.save(createTemplate({ templateName: "Core", courseCode: "PSY3421" }, sampleOutcomes()));

      const outcomes = await loadTemplateOutcomes(ctx, { templateName: "Core", courseCode: "PSY3421" });

      expect(outcomes).toEqual(sampleOutcomes());
    });

    it("reports what is missing", async () => {
      ctx = await makeToolContext(twoSectionCanvas());

      await expect(loadTemplateOutcomes(ctx, { templateName: "Core" })).rejects.toThrow(
        "[COR-1006] courseCode is required when applying a saved template",
      );
      await expect(loadTemplateOutcomes(ctx, { templateName: "Core", courseCode: "PSY3421" })).rejects.toThrow(
        '[COR-1006] Template "Core" for course PSY3421 not found',
      );
      await expect(loadTemplateOutcomes(ctx, {})).rejects.toThrow(
        "[COR-1006] Provide either outcomes or a saved templateName with its courseCode",
      );
    });
  });
});
