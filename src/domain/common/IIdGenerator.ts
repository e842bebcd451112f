/**
 * Interface for generating unique IDs.
 */
export interface IIdGenerator {
  /**
   * Generate a unique ID with the given prefix.
   * @param prefix - Prefix for the ID (e.g., 'task', 'wf')
   * @example
   * generate('task') => 'task_3b241101-e2bb-4255-8caf-4136c566a962'
   */
  generate(prefix: string): string;

  /**
   * Validate an ID format.
   * @returns true if ID is valid
   */
  validate?(id: string): boolean;
}
