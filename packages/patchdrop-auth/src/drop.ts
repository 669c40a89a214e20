import type { CanonicalMap, CanonicalValue } from "./canonical.js";
import { toCanonicalValue } from "./canonical.js";
import { IntegrityError } from "./errors.js";
import { assertMap, assertString, get, mapGet, optional, toInteger } from "./internal/fields.js";
import type { IdentityId } from "./identity.js";
import type { Role } from "./role.js";
import { assertRoleShape, roleFromCanonical, roleToCanonical } from "./role.js";

export const DROP_FMT_VERSION = 1;
export const DESCRIPTION_MAX_LEN = 128;

export type BranchRole = Role & { description: string | null };

export type DropRoles = {
  /** Authorizes log writes and policy updates. */
  drop: Role;
  snapshot: Role;
  mirrors: Role;
  /** Keyed by full ref name, e.g. `refs/heads/main`. */
  branches: ReadonlyMap<string, BranchRole>;
};

export type Drop = {
  fmtVersion: number;
  description: string;
  roles: DropRoles;
  custom: CanonicalMap;
};

export function branchRef(branch: string): string {
  return branch.startsWith("refs/") ? branch : `refs/heads/${branch}`;
}

export function createDrop(opts: {
  description: string;
  drop: Role;
  snapshot?: Role;
  mirrors?: Role;
  branches?: ReadonlyMap<string, BranchRole>;
  custom?: CanonicalMap;
}): Drop {
  const drop: Drop = {
    fmtVersion: DROP_FMT_VERSION,
    description: opts.description,
    roles: {
      drop: opts.drop,
      snapshot: opts.snapshot ?? opts.drop,
      mirrors: opts.mirrors ?? opts.drop,
      branches: opts.branches ?? new Map(),
    },
    custom: opts.custom ?? new Map(),
  };
  assertDropShape(drop);
  return drop;
}

/** Single-identity drop: every role is `{ids: [owner], threshold: 1}`. */
export function createSoloDrop(opts: { description: string; owner: IdentityId; branches?: string[] }): Drop {
  const role: Role = { ids: [opts.owner], threshold: 1 };
  return createDrop({
    description: opts.description,
    drop: role,
    branches: new Map((opts.branches ?? []).map((b): [string, BranchRole] => [branchRef(b), { ...role, description: null }])),
  });
}

export function assertDropShape(drop: Drop): void {
  if (drop.fmtVersion > DROP_FMT_VERSION) throw new IntegrityError(`drop format version ${drop.fmtVersion} is not supported`);
  if ([...drop.description].length > DESCRIPTION_MAX_LEN) {
    throw new IntegrityError(`drop description must be at most ${DESCRIPTION_MAX_LEN} characters`);
  }
  assertRoleShape(drop.roles.drop, "drop");
  assertRoleShape(drop.roles.snapshot, "snapshot");
  assertRoleShape(drop.roles.mirrors, "mirrors");
  for (const [ref, role] of drop.roles.branches) {
    if (!ref.startsWith("refs/")) throw new IntegrityError(`branch role ${ref} must name a full ref`);
    assertRoleShape(role, `branches:${ref}`);
  }
}

export function branchRoleFor(drop: Drop, branch: string): BranchRole | undefined {
  return drop.roles.branches.get(branchRef(branch));
}

export function dropToCanonical(drop: Drop): CanonicalMap {
  const branches = new Map<string, CanonicalValue>();
  for (const [ref, role] of drop.roles.branches) {
    const m = new Map<string, CanonicalValue>(roleToCanonical(role));
    if (role.description !== null) m.set("description", role.description);
    branches.set(ref, m);
  }
  return new Map<string, CanonicalValue>([
    ["v", drop.fmtVersion],
    ["description", drop.description],
    [
      "roles",
      new Map<string, CanonicalValue>([
        ["drop", roleToCanonical(drop.roles.drop)],
        ["snapshot", roleToCanonical(drop.roles.snapshot)],
        ["mirrors", roleToCanonical(drop.roles.mirrors)],
        ["branches", branches],
      ]),
    ],
    ["custom", drop.custom],
  ]);
}

export function dropFromCanonical(val: unknown, field = "drop"): Drop {
  const map = assertMap(val, field);
  const roles = assertMap(get(map, "roles", field), `${field}.roles`);
  const branches = new Map<string, BranchRole>();
  for (const [ref, raw] of assertMap(mapGet(roles, "branches") ?? new Map(), `${field}.roles.branches`)) {
    const name = assertString(ref, `${field}.roles.branches key`);
    const path = `${field}.roles.branches.${name}`;
    const role = roleFromCanonical(raw, path);
    const description = optional(mapGet(assertMap(raw, path), "description"), (v) => assertString(v, `${path}.description`));
    branches.set(name, { ...role, description });
  }
  const custom = toCanonicalValue(mapGet(map, "custom") ?? new Map(), `${field}.custom`);
  if (!(custom instanceof Map)) throw new IntegrityError(`${field}.custom must be a map`);

  const drop: Drop = {
    fmtVersion: toInteger(get(map, "v", field), `${field}.v`),
    description: assertString(get(map, "description", field), `${field}.description`),
    roles: {
      drop: roleFromCanonical(get(roles, "drop", `${field}.roles`), `${field}.roles.drop`),
      snapshot: roleFromCanonical(get(roles, "snapshot", `${field}.roles`), `${field}.roles.snapshot`),
      mirrors: roleFromCanonical(get(roles, "mirrors", `${field}.roles`), `${field}.roles.mirrors`),
      branches,
    },
    custom,
  };
  assertDropShape(drop);
  return drop;
}
