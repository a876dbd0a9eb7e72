import type {
  ResumeEducation,
  ResumeExperience,
  ResumeProject,
  ResumeRecord,
} from "../shared/types/resume.types";
import { isRecord } from "../shared/utils/is-record";

function toText(value: unknown): string {
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return "";
}

function toTextList(value: unknown): string[] {
  if (typeof value === "string") {
    return value
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean);
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value.map(toText).filter(Boolean);
}

function toRecordList<T>(value: unknown, map: (item: Record<string, unknown>) => T): T[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter(isRecord).map(map);
}

/**
 * Fills every missing résumé field: text fields become "", list fields become []. A
 * comma-separated string is accepted where a list of strings is expected.
 */
export function normalizeResumeRecord(raw: Record<string, unknown>): ResumeRecord {
  return {
    name: toText(raw.name),
    email: toText(raw.email),
    phone: toText(raw.phone),
    education: toRecordList<ResumeEducation>(raw.education, (item) => ({
      degree: toText(item.degree),
      institution: toText(item.institution),
      year: toText(item.year),
    })),
    skills: toTextList(raw.skills),
    experience: toRecordList<ResumeExperience>(raw.experience, (item) => ({
      title: toText(item.title),
      company: toText(item.company),
      duration: toText(item.duration),
      description: toText(item.description),
    })),
    projects: toRecordList<ResumeProject>(raw.projects, (item) => ({
      title: toText(item.title),
      tech: toTextList(item.tech),
      description: toText(item.description),
    })),
  };
}
