/**
 * Per-process session flags
 *
 * Created once at startup from global CLI flags and passed explicitly to
 * the resolver and the confirmation gate.
 */

export interface Session {
  /**
   * Skip every confirmation and prompt (--yes).
   *
   * This silently permits production operations. It exists for CI and
   * other non-interactive use.
   */
  readonly assumeYes: boolean;

  /** stdin and stdout are both terminals */
  readonly interactive: boolean;

  readonly verbose: boolean;
}

export function createSession(flags: Partial<Session> = {}): Session {
  return Object.freeze({
    assumeYes: flags.assumeYes ?? false,
    interactive: flags.interactive ?? false,
    verbose: flags.verbose ?? false,
  });
}

/**
 * Whether the session may show prompts
 */
export function promptsAllowed(session: Session): boolean {
  return session.interactive && !session.assumeYes;
}

/**
 * Detect whether the given streams are attached to a terminal
 */
export function detectInteractive(
  input: { isTTY?: boolean } = process.stdin,
  output: { isTTY?: boolean } = process.stdout
): boolean {
  return input.isTTY === true && output.isTTY === true;
}
