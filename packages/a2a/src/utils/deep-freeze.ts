/** Recursively freeze an object and all nested objects. */
export function deepFreeze<T extends object>(obj: T): T {
  Object.freeze(obj);
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return obj;
}

/** True when the object and every object reachable from it are frozen */
export function isDeepFrozen(obj: object): boolean {
  if (!Object.isFrozen(obj)) return false;
  return Object.values(obj).every(
    (value) => value === null || typeof value !== "object" || isDeepFrozen(value),
  );
}
