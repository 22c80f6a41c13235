/**
 * Last path segment of an ARN:
 * `arn:aws:ecs:region:acct:task-definition/app:3` -> `app:3`,
 * `arn:aws:ecs:region:acct:task/cluster/0123abcd` -> `0123abcd`.
 */
export function arnToName(arn: string): string {
  const idx = arn.lastIndexOf("/");
  return idx >= 0 ? arn.slice(idx + 1) : arn;
}

export type TaskDefinitionName = {
  family: string;
  revision?: number;
};

export function parseTaskDefinitionName(ref: string): TaskDefinitionName {
  const [family, rawRevision] = arnToName(ref).split(":", 2);
  const revision = rawRevision === undefined ? Number.NaN : Number.parseInt(rawRevision, 10);
  return Number.isInteger(revision) ? { family, revision } : { family };
}
