import { FileRef } from "@/types/ccs.types";

/**
 * Represents the schema for the 'submissions' collection, keyed by submission id.
 */
export interface ISubmissionRecord {
  _id: string;
  teamId: string;
  problemId: string;
  languageId: string;
  time: string;
  contestTime: string;
  files: FileRef[];
  token: number; // event that last wrote this record
}
