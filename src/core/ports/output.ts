/**
 * Output Port Interface
 *
 * Defines the contract for all user-facing output operations.
 * Commands write through this interface instead of console.log directly.
 *
 * Implementations:
 *   - consoleOutput (default): reports to stdout, notices to stderr
 *   - test doubles that collect lines in memory
 */

export interface OutputPort {
  /** Write report or search output (stdout) */
  info(message: string): void;

  /** Write a notice such as "ignoring" or "not found" (stderr) */
  warn(message: string): void;
}
