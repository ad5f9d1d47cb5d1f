/**
 * NATS subject patterns for idlestop
 *
 * All subjects are prefixed with the namespace for isolation.
 */

/**
 * Build a namespaced subject
 */
export function buildSubject(namespace: string, ...parts: string[]): string {
  return `idlestop.${namespace}.${parts.join('.')}`;
}

/**
 * Subject patterns for activity reporting
 */
export const ActivitySubjects = {
  /**
   * Activity reports (any message counts as activity)
   * Pattern: idlestop.{namespace}.activity
   */
  activity: (namespace: string) =>
    buildSubject(namespace, 'activity'),

  /**
   * Monitor status requests (request/reply)
   * Pattern: idlestop.{namespace}.status
   */
  status: (namespace: string) =>
    buildSubject(namespace, 'status'),
};
