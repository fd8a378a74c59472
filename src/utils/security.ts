/**
 * Input validation for values that end up as git or process arguments.
 */
export class SecurityValidator {
  /**
   * Patterns that are never accepted in a branch name
   */
  private static readonly DANGEROUS_BRANCH_PATTERNS = [
    /\.\./,            // Path traversal (also invalid as a git ref)
    /^-/,              // Option injection
    /[\x00-\x1f\x7f]/, // Control characters including null bytes
    /[;&|`$(){}]/,     // Shell metacharacters
    /\s/,              // Whitespace
    /@\{/,             // Reflog syntax
    /\/\//,            // Empty path segment
    /\.lock(\/|$)/     // Reserved by git for ref locks
  ];

  /**
   * Validates a branch name that is also used as a directory below the
   * worktree root.
   *
   * @returns true if valid (throws on invalid)
   * @throws {Error} When the name contains dangerous patterns or has an invalid format
   */
  static validateBranchName(branch: string): boolean {
    const sanitized = branch.trim();

    if (this.DANGEROUS_BRANCH_PATTERNS.some(pattern => pattern.test(sanitized))) {
      throw new Error('Invalid branch name: contains dangerous characters');
    }

    // Must start and end with alphanumeric (single characters allowed)
    if (!/^[a-zA-Z0-9]([a-zA-Z0-9/_.-]*[a-zA-Z0-9])?$/.test(sanitized)) {
      throw new Error('Invalid branch name format');
    }

    if (sanitized.length > 255) {
      throw new Error('Branch name too long');
    }

    return true;
  }
}

/**
 * Utility functions for consistent error handling across the codebase.
 */
export class ErrorUtils {
  /**
   * Extracts error message from unknown error types consistently.
   */
  static extractErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
