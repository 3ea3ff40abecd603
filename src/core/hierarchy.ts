import type { HierarchicalGroup, Issue, TimeEntry } from '../types/index.js';

/** Hard ceiling on parent-chain length; anything deeper is treated as corrupt link data. */
export const MAX_HIERARCHY_DEPTH = 15;

export const ORPHAN_PREFIX = '__orphan__';

export type IssueMap = Map<string, Issue>;

export function isEpic(issue: Issue): boolean {
  return issue.type.toLowerCase() === 'epic';
}

export function isOrphanGroupKey(key: string): boolean {
  return key.startsWith(ORPHAN_PREFIX);
}

/**
 * Key -> issue lookup. The first occurrence of a duplicated key wins.
 */
export function buildIssueMap(issues: Issue[]): IssueMap {
  const map: IssueMap = new Map();
  for (const issue of issues) {
    if (!map.has(issue.key)) {
      map.set(issue.key, issue);
    }
  }
  return map;
}

/**
 * The epic link only counts when it names an issue in the batch that really
 * is an Epic.
 */
function linkedEpicKey(issue: Issue, issueMap: IssueMap): string | undefined {
  if (!issue.epicLinkKey) return undefined;
  const target = issueMap.get(issue.epicLinkKey);
  return target && isEpic(target) ? target.key : undefined;
}

/**
 * Path from the owning Epic down to `issue`, e.g. ['EPIC-1', 'STORY-2', 'TASK-3'].
 * Returns [] when no Epic can be reached. `visited` is threaded through the
 * recursion so a parent cycle ends the branch instead of looping.
 */
export function resolveEpicPath(
  issue: Issue,
  issueMap: IssueMap,
  visited: Set<string> = new Set(),
  depth: number = 0
): string[] {
  if (depth > MAX_HIERARCHY_DEPTH || visited.has(issue.key)) {
    return [];
  }
  visited.add(issue.key);

  if (isEpic(issue)) {
    return [issue.key];
  }

  const epicKey = linkedEpicKey(issue, issueMap);
  const parent = issue.parentKey ? issueMap.get(issue.parentKey) : undefined;

  if (parent) {
    const parentPath = resolveEpicPath(parent, issueMap, visited, depth + 1);
    if (parentPath.length > 0) {
      return [...parentPath, issue.key];
    }
  }

  if (epicKey) {
    return [epicKey, issue.key];
  }

  return [];
}

export function findEpicForIssue(issue: Issue, issueMap: IssueMap): string | undefined {
  const [epicKey] = resolveEpicPath(issue, issueMap);
  if (!epicKey) return undefined;

  const epic = issueMap.get(epicKey);
  return epic && isEpic(epic) ? epicKey : undefined;
}

/**
 * Copies the batch and fills in the resolution fields:
 * - `epicLinkKey` inherited from the nearest ancestor that has one, repeated
 *   until nothing changes so chain order in the input does not matter
 * - `parentType` of the direct parent, or Epic for issues linked to an Epic
 * - `depth` below the owning Epic (undefined for orphans)
 */
export function propagateEpicLinks(issues: Issue[]): Issue[] {
  const resolved: IssueMap = new Map();
  for (const issue of issues) {
    if (!resolved.has(issue.key)) {
      resolved.set(issue.key, { ...issue });
    }
  }

  const maxPasses = resolved.size + 1;
  let changed = true;
  for (let pass = 0; changed && pass < maxPasses; pass++) {
    changed = false;
    for (const issue of resolved.values()) {
      if (isEpic(issue) || linkedEpicKey(issue, resolved) || !issue.parentKey) continue;

      const parent = resolved.get(issue.parentKey);
      if (!parent) continue;

      const inherited = isEpic(parent) ? parent.key : linkedEpicKey(parent, resolved);
      if (inherited && issue.epicLinkKey !== inherited) {
        issue.epicLinkKey = inherited;
        changed = true;
      }
    }
  }

  for (const issue of resolved.values()) {
    const parent = issue.parentKey ? resolved.get(issue.parentKey) : undefined;
    if (parent) {
      issue.parentType = parent.type;
    } else if (linkedEpicKey(issue, resolved)) {
      issue.parentType = 'Epic';
    }

    const path = resolveEpicPath(issue, resolved);
    issue.depth = path.length > 0 ? path.length - 1 : undefined;
  }

  return [...resolved.values()];
}

function createGroup(root?: Issue): HierarchicalGroup {
  return {
    root,
    children: [],
    childrenByParent: new Map(),
    entries: [],
  };
}

/**
 * Groups a flat batch into one HierarchicalGroup per Epic. Issues whose
 * parent sits in the same group hang under that parent; the rest are direct
 * children of the Epic. Issues with no reachable Epic land in a per-project
 * orphan bucket keyed `__orphan__<project>`.
 */
export function groupByHierarchy(
  issues: Issue[],
  entries: TimeEntry[] = []
): Map<string, HierarchicalGroup> {
  const resolved = propagateEpicLinks(issues);
  const issueMap = buildIssueMap(resolved);
  const groups = new Map<string, HierarchicalGroup>();
  const groupKeyByIssue = new Map<string, string>();
  const members = new Map<string, Issue[]>();

  for (const issue of resolved) {
    if (isEpic(issue)) {
      groups.set(issue.key, createGroup(issue));
      groupKeyByIssue.set(issue.key, issue.key);
    }
  }

  for (const issue of resolved) {
    if (isEpic(issue)) continue;
    const epicKey = findEpicForIssue(issue, issueMap);
    const groupKey = epicKey && groups.has(epicKey)
      ? epicKey
      : `${ORPHAN_PREFIX}${issue.project ?? 'unknown'}`;
    groupKeyByIssue.set(issue.key, groupKey);
  }

  for (const issue of resolved) {
    if (isEpic(issue)) continue;

    const groupKey = groupKeyByIssue.get(issue.key);
    if (!groupKey) continue;

    let group = groups.get(groupKey);
    if (!group) {
      group = createGroup();
      groups.set(groupKey, group);
    }
    members.set(groupKey, [...(members.get(groupKey) ?? []), issue]);

    const parent = issue.parentKey ? issueMap.get(issue.parentKey) : undefined;
    const nested = parent !== undefined
      && !isEpic(parent)
      && groupKeyByIssue.get(parent.key) === groupKey;

    if (parent && nested) {
      const siblings = group.childrenByParent.get(parent.key) ?? [];
      siblings.push(issue);
      group.childrenByParent.set(parent.key, siblings);
    } else {
      group.children.push(issue);
    }
  }

  for (const [groupKey, groupMembers] of members) {
    const group = groups.get(groupKey);
    if (group) {
      attachUnreachable(group, groupMembers);
    }
  }

  for (const entry of entries) {
    const groupKey = groupKeyByIssue.get(entry.issueKey);
    const group = groupKey ? groups.get(groupKey) : undefined;
    group?.entries.push(entry);
  }

  return groups;
}

/**
 * Epic groups ordered by Epic key, followed by orphan buckets.
 */
export function sortedGroups(
  groups: Map<string, HierarchicalGroup>
): Array<[string, HierarchicalGroup]> {
  const all = [...groups.entries()];
  const byKey = (a: [string, HierarchicalGroup], b: [string, HierarchicalGroup]) =>
    a[0].localeCompare(b[0], undefined, { numeric: true });

  const epicGroups = all.filter(([key]) => !isOrphanGroupKey(key)).sort(byKey);
  const orphanGroups = all.filter(([key]) => isOrphanGroupKey(key)).sort(byKey);
  return [...epicGroups, ...orphanGroups];
}

/**
 * Parents that point at each other (possible when both also carry an epic
 * link) leave a loop no walk from the root can enter. The first member of
 * such a loop becomes a direct child so the rest hang off it.
 */
function attachUnreachable(group: HierarchicalGroup, groupMembers: Issue[]): void {
  for (const issue of groupMembers) {
    const reachable = new Set(walkGroup(group, Number.POSITIVE_INFINITY).map((i) => i.key));
    if (reachable.has(issue.key)) continue;

    if (issue.parentKey) {
      const siblings = group.childrenByParent.get(issue.parentKey) ?? [];
      group.childrenByParent.set(
        issue.parentKey,
        siblings.filter((sibling) => sibling.key !== issue.key)
      );
    }
    group.children.push(issue);
  }
}

/**
 * Every issue of a group in pre-order: root, then each child followed by its
 * own descendants.
 */
export function groupIssues(group: HierarchicalGroup): Issue[] {
  return walkGroup(group, MAX_HIERARCHY_DEPTH);
}

function walkGroup(group: HierarchicalGroup, maxDepth: number): Issue[] {
  const result: Issue[] = [];
  const visited = new Set<string>();

  const visit = (issue: Issue, depth: number): void => {
    if (depth > maxDepth || visited.has(issue.key)) return;
    visited.add(issue.key);
    result.push(issue);
    for (const child of group.childrenByParent.get(issue.key) ?? []) {
      visit(child, depth + 1);
    }
  };

  if (group.root) {
    visit(group.root, 0);
  }
  for (const child of group.children) {
    visit(child, 1);
  }
  return result;
}

export function countGroupIssues(group: HierarchicalGroup): number {
  return groupIssues(group).length;
}
