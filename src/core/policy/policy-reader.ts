/**
 * Policy Configuration Reader
 *
 * Reads the layered limits file. Each line is `scope:attribute:value`, where
 * scope is DEFAULT, a UNIX group name or a user name:
 *
 * ```
 * # site defaults
 * DEFAULT:fairshare:2
 * DEFAULT:GrpTRES:cpu=1500
 * physics:MaxTRESPerNode:gres/gpu=2
 * alice:QOS:long
 * ```
 */

import * as fs from "node:fs/promises";
import { canonicalAttribute, normalizeValue, type Attribute } from "../attributes/index.js";
import type { DiagnosticSink } from "../diagnostics/index.js";
import { AcctSyncError, ErrorCode } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("policy");

export const DEFAULT_SCOPE = "DEFAULT";

export type PolicyLayer = ReadonlyMap<Attribute, string>;

export interface PolicySnapshot {
  readonly defaults: PolicyLayer;
  /** Keyed by lower-cased group name */
  readonly groups: ReadonlyMap<string, PolicyLayer>;
  /** Keyed by scope string exactly as written */
  readonly users: ReadonlyMap<string, PolicyLayer>;
}

export interface PolicyContext {
  groupNames: ReadonlySet<string>;
  /** Users from passwd and from scheduler associations */
  knownUsers: ReadonlySet<string>;
}

/**
 * Values seeded into the default layer before the file is read
 */
export type SeedDefaults = Partial<Record<Attribute, string>>;

export function emptyPolicy(seed: SeedDefaults = {}): PolicySnapshot {
  return { defaults: seedLayer(seed), groups: new Map(), users: new Map() };
}

function seedLayer(seed: SeedDefaults): Map<Attribute, string> {
  const layer = new Map<Attribute, string>();
  for (const [name, value] of Object.entries(seed)) {
    const attribute = canonicalAttribute(name);
    if (attribute && value !== undefined && value.trim() !== "") {
      layer.set(attribute, normalizeValue(attribute, value));
    }
  }
  return layer;
}

function layerFor(layers: Map<string, Map<Attribute, string>>, key: string): Map<Attribute, string> {
  let layer = layers.get(key);
  if (!layer) {
    layer = new Map();
    layers.set(key, layer);
  }
  return layer;
}

/**
 * Parse policy text. Lines containing `#` anywhere are comments; they and
 * lines without exactly three fields are skipped. Later lines replace earlier ones for the
 * same scope and attribute.
 */
export function parsePolicy(
  text: string,
  context: PolicyContext,
  diagnostics: DiagnosticSink,
  seed: SeedDefaults = {}
): PolicySnapshot {
  const defaults = seedLayer(seed);
  const groups = new Map<string, Map<Attribute, string>>();
  const users = new Map<string, Map<Attribute, string>>();

  text.split("\n").forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.replace(/\r$/, "");
    if (line.includes("#")) return;

    const fields = line.split(":");
    if (fields.length !== 3) return;

    const [rawScope = "", rawAttribute = "", rawValue = ""] = fields;

    const scope = rawScope.trim();
    if (!scope) return;

    const attribute = canonicalAttribute(rawAttribute);
    if (!attribute) {
      diagnostics.warning(`policy line ${lineNumber}: unknown attribute "${rawAttribute.trim()}" ignored`, scope);
      return;
    }
    if (!rawValue.trim()) {
      diagnostics.warning(`policy line ${lineNumber}: empty value for ${scope}:${attribute} ignored`, scope);
      return;
    }
    const value = normalizeValue(attribute, rawValue);

    if (scope === DEFAULT_SCOPE) {
      defaults.set(attribute, value);
      return;
    }

    const groupKey = scope.toLowerCase();
    if (context.groupNames.has(groupKey)) {
      layerFor(groups, groupKey).set(attribute, value);
      return;
    }

    if (!context.knownUsers.has(scope)) {
      diagnostics.notice(
        `policy scope "${scope}" matches no known group or user; kept as a user setting`,
        scope
      );
    }
    layerFor(users, scope).set(attribute, value);
  });

  logger.debug(
    { defaults: defaults.size, groups: groups.size, users: users.size },
    "Policy parsed"
  );
  return { defaults, groups, users };
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * Read and parse the policy file. A missing file is a warning and yields
 * the seeded defaults only; any other read failure is fatal.
 */
export async function readPolicyFile(
  filePath: string,
  context: PolicyContext,
  diagnostics: DiagnosticSink,
  seed: SeedDefaults = {}
): Promise<PolicySnapshot> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      diagnostics.warning(`policy file ${filePath} not found; using default settings only`);
      return emptyPolicy(seed);
    }
    throw new AcctSyncError(`Cannot read policy file ${filePath}`, ErrorCode.POLICY_FILE_UNREADABLE, {
      filePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return parsePolicy(text, context, diagnostics, seed);
}
