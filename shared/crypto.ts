/** Random identifier for runs and browser sessions, optionally prefixed: `run_<uuid>`. */
export const randomId = (prefix?: string): string => {
  const id = globalThis.crypto.randomUUID();
  return prefix ? `${prefix}_${id}` : id;
};
