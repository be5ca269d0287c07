export const DEFAULT_API_NAME = 'Unnamed';
export const DEFAULT_API_GROUP = 'Ungrouped';

export type ApiIdentity = {
  name: string;
  group: string;
};

export type ApiDetails = {
  identity: ApiIdentity;
  /** `${name}__${group}`; orders the aggregate file. */
  key: string;
  /** Absent when the block has no @apiVersion; such blocks are never indexed. */
  version?: string;
};

const NAME_RE = /@apiName\s+(\S+)/;
const GROUP_RE = /@apiGroup\s+(\S+)/;
const VERSION_RE = /@apiVersion\s+([0-9.]+)/;

export function identityKey(identity: ApiIdentity): string {
  return `${identity.name}__${identity.group}`;
}

export function extractApiDetails(comment: string): ApiDetails {
  const nameMatch = NAME_RE.exec(comment);
  const groupMatch = GROUP_RE.exec(comment);
  const versionMatch = VERSION_RE.exec(comment);

  const identity: ApiIdentity = {
    name: nameMatch ? nameMatch[1] : DEFAULT_API_NAME,
    group: groupMatch ? groupMatch[1] : DEFAULT_API_GROUP,
  };

  return {
    identity,
    key: identityKey(identity),
    version: versionMatch ? versionMatch[1] : undefined,
  };
}
