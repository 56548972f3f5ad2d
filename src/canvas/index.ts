export { CanvasService } from "./service.js";
export type { CanvasDataSource, GetCoursesOptions, EnrollmentType } from "./service.js";
export type * from "./types.js";
