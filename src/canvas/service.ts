/**
 * Canvas Outcome Reporter
 * Copyright (c) 2025 Rohan Muppa. All rights reserved.
 * Licensed under AGPL-3.0 — see LICENSE file for details.
 */

import type { CanvasApiClient } from "../api/index.js";
import { log } from "../utils/logger.js";
import type {
  Account,
  Assignment,
  Course,
  Enrollment,
  QuizGroup,
  QuizQuestion,
  QuizSubmission,
  QuizSubmissionQuestion,
  Submission,
  User,
} from "./types.js";

export type EnrollmentType = "teacher" | "ta" | "designer";

export interface GetCoursesOptions {
  enrollmentType?: EnrollmentType;
  /** List every course in the accounts the user administers. */
  adminMode?: boolean;
}

/**
 * Read-only view of Canvas used by the reporting pipeline.
 * Tests supply an in-memory implementation.
 */
export interface CanvasDataSource {
  getCourse(courseId: number): Promise<Course>;
  getAssignments(courseId: number): Promise<Assignment[]>;
  getAssignment(courseId: number, assignmentId: number): Promise<Assignment>;
  getEnrollments(courseId: number): Promise<Enrollment[]>;
  getSubmissions(courseId: number, assignmentId: number): Promise<Submission[]>;
  getQuizQuestions(courseId: number, quizId: number): Promise<QuizQuestion[]>;
  getQuizGroup(courseId: number, quizId: number, groupId: number): Promise<QuizGroup>;
  getQuizSubmissions(courseId: number, quizId: number): Promise<QuizSubmission[]>;
  getQuizSubmissionQuestions(quizSubmissionId: number): Promise<QuizSubmissionQuestion[]>;
}

const COURSE_INCLUDES = ["term", "total_students"];

export class CanvasService implements CanvasDataSource {
  constructor(private readonly client: CanvasApiClient) {}

  /** @param useCache - false forces a round trip, e.g. to verify the token */
  async getSelf(useCache = true): Promise<User> {
    return this.client.get<User>("/api/v1/users/self", {
      ttl: useCache ? this.client.cacheTTLs.profile : undefined,
    });
  }

  async getAccounts(): Promise<Account[]> {
    return this.client.getAll<Account>("/api/v1/accounts", {
      ttl: this.client.cacheTTLs.profile,
    });
  }

  async getCourses(options: GetCoursesOptions = {}): Promise<Course[]> {
    const ttl = this.client.cacheTTLs.courses;

    if (!options.adminMode) {
      return this.client.getAll<Course>("/api/v1/courses", {
        params: {
          enrollment_type: options.enrollmentType ?? "teacher",
          enrollment_state: "active",
          "include[]": COURSE_INCLUDES,
        },
        ttl,
      });
    }

    const accounts = await this.getAccounts();
    log("DEBUG", `Admin mode: listing courses across ${accounts.length} account(s)`);

    // Sub-account listings overlap their parent's, keep the first copy of each course
    const seen = new Map<number, Course>();
    for (const account of accounts) {
      const courses = await this.client.getAll<Course>(`/api/v1/accounts/${account.id}/courses`, {
        params: {
          "include[]": COURSE_INCLUDES,
          with_enrollments: true,
          "state[]": ["available", "completed"],
        },
        ttl,
      });
      for (const course of courses) {
        if (!seen.has(course.id)) seen.set(course.id, course);
      }
    }
    return [...seen.values()];
  }

  async getCourse(courseId: number): Promise<Course> {
    return this.client.get<Course>(`/api/v1/courses/${courseId}`, {
      params: { "include[]": COURSE_INCLUDES },
      ttl: this.client.cacheTTLs.courses,
    });
  }

  async getAssignments(courseId: number): Promise<Assignment[]> {
    return this.client.getAll<Assignment>(`/api/v1/courses/${courseId}/assignments`, {
      params: { "include[]": ["rubric"] },
      ttl: this.client.cacheTTLs.assignments,
    });
  }

  async getAssignment(courseId: number, assignmentId: number): Promise<Assignment> {
    return this.client.get<Assignment>(`/api/v1/courses/${courseId}/assignments/${assignmentId}`, {
      params: { "include[]": ["rubric"] },
      ttl: this.client.cacheTTLs.assignments,
    });
  }

  async getEnrollments(courseId: number): Promise<Enrollment[]> {
    return this.client.getAll<Enrollment>(`/api/v1/courses/${courseId}/enrollments`, {
      params: { "type[]": ["StudentEnrollment"], "state[]": ["active"] },
      ttl: this.client.cacheTTLs.enrollments,
    });
  }

  // Never cached: grades move while a report is prepared
  async getSubmissions(courseId: number, assignmentId: number): Promise<Submission[]> {
    return this.client.getAll<Submission>(
      `/api/v1/courses/${courseId}/assignments/${assignmentId}/submissions`,
      { params: { "include[]": ["user", "rubric_assessment"] } },
    );
  }

  async getQuizQuestions(courseId: number, quizId: number): Promise<QuizQuestion[]> {
    return this.client.getAll<QuizQuestion>(`/api/v1/courses/${courseId}/quizzes/${quizId}/questions`, {
      ttl: this.client.cacheTTLs.quizStructure,
    });
  }

  async getQuizGroup(courseId: number, quizId: number, groupId: number): Promise<QuizGroup> {
    return this.client.get<QuizGroup>(`/api/v1/courses/${courseId}/quizzes/${quizId}/groups/${groupId}`, {
      ttl: this.client.cacheTTLs.quizStructure,
    });
  }

  async getQuizSubmissions(courseId: number, quizId: number): Promise<QuizSubmission[]> {
    return this.client.getAll<QuizSubmission>(`/api/v1/courses/${courseId}/quizzes/${quizId}/submissions`, {
      itemsKey: "quiz_submissions",
    });
  }

  async getQuizSubmissionQuestions(quizSubmissionId: number): Promise<QuizSubmissionQuestion[]> {
    return this.client.getAll<QuizSubmissionQuestion>(
      `/api/v1/quiz_submissions/${quizSubmissionId}/questions`,
      { itemsKey: "quiz_submission_questions" },
    );
  }
}
