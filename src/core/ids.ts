import { ulid } from "ulid";

export type SubmissionId = `sub_${string}`;

export function newSubmissionId(): SubmissionId {
  return `sub_${ulid()}`;
}
