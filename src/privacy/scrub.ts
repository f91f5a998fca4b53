import {
  SCRUB_RULES,
  hasSignalSubstring,
  isContentDerivedKey,
  isRawTextKey,
  normalizeKey,
  type ScrubRules,
} from "./scrub_rules";

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  if (value === null || typeof value !== "object") return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// Serialized as a JSON scalar or by a known built-in toJSON, so kept as-is.
function isScalarObject(value: object): boolean {
  return (
    value instanceof Date ||
    ArrayBuffer.isView(value) ||
    value instanceof String ||
    value instanceof Number ||
    value instanceof Boolean
  );
}

/**
 * Any non-array object whose own keys would reach JSON output:
 * plain objects, class instances and `Object.create(...)` objects alike.
 */
function isKeyedObject(value: unknown): value is object {
  return value !== null && typeof value === "object" && !Array.isArray(value) && !isScalarObject(value);
}

const codePointLength = (value: string) => Array.from(value).length;

function isOversized(value: unknown, rules: ScrubRules): boolean {
  if (typeof value === "string") return codePointLength(value) > rules.maxStringChars;
  if (Array.isArray(value)) return value.length > rules.maxListItems;
  if (isKeyedObject(value)) return Object.keys(value).length > rules.maxObjectKeys;
  return false;
}

// "__proto__" arrives as an ordinary own key from JSON.parse; plain assignment would rewrite the prototype.
function assignOwn(target: PlainObject, key: string, value: unknown) {
  if (key === "__proto__") {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
    return;
  }
  target[key] = value;
}

// Output is a plain object of own enumerable keys; function-valued keys, an own `toJSON` included, are dropped.
function scrubObject(obj: object, rules: ScrubRules, depth: number, ancestors: WeakSet<object>): PlainObject {
  const out: PlainObject = {};
  const entries: Array<[string, unknown]> = Object.entries(obj);
  let kept = 0;

  for (const [key, child] of entries) {
    if (kept >= rules.maxObjectKeys) break;
    if (typeof child === "function") continue;

    const normalized = normalizeKey(key);
    if (isRawTextKey(normalized, rules) || isContentDerivedKey(normalized, rules)) continue;
    // Oversized values under a content-ish key are dropped whole; a truncated fragment could still leak text.
    if (hasSignalSubstring(normalized, rules) && isOversized(child, rules)) continue;

    assignOwn(out, key, scrubValue(child, rules, depth + 1, ancestors));
    kept += 1;
  }

  return out;
}

function visit(
  node: object,
  rules: ScrubRules,
  depth: number,
  ancestors: WeakSet<object>,
  run: () => unknown
): unknown {
  if (depth > rules.maxDepth || ancestors.has(node)) return null;

  ancestors.add(node);
  try {
    return run();
  } catch {
    // Exotic objects (throwing getters, revoked proxies) are replaced rather than allowed to abort the scrub.
    return null;
  } finally {
    ancestors.delete(node);
  }
}

function scrubValue(value: unknown, rules: ScrubRules, depth: number, ancestors: WeakSet<object>): unknown {
  try {
    if (Array.isArray(value)) {
      const items: unknown[] = value;
      return visit(items, rules, depth, ancestors, () =>
        items.slice(0, rules.maxListItems).map((item) => scrubValue(item, rules, depth + 1, ancestors))
      );
    }
    if (isKeyedObject(value)) {
      const obj = value;
      return visit(obj, rules, depth, ancestors, () => scrubObject(obj, rules, depth, ancestors));
    }
    return value;
  } catch {
    // A revoked proxy throws on inspection.
    return null;
  }
}

/**
 * Recursive content scrubber. Pure, total and idempotent:
 * scrub(scrub(x)) deep-equals scrub(x) for every input.
 */
export function scrub(value: unknown, rules: ScrubRules = SCRUB_RULES): unknown {
  return scrubValue(value, rules, 0, new WeakSet());
}

export function scrubRecord(value: unknown, rules: ScrubRules = SCRUB_RULES): Record<string, unknown> {
  const scrubbed = scrub(value, rules);
  return isPlainObject(scrubbed) ? scrubbed : {};
}
