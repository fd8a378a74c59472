/**
 * Environment detection used to decide whether the CLI may ask questions.
 */
export class EnvironmentUtils {
  /**
   * Checks if the application is running in a CI/CD environment.
   */
  static isCiEnvironment(env: NodeJS.ProcessEnv = process.env): boolean {
    return (
      !!env.CI ||
      !!env.GITHUB_ACTIONS ||
      !!env.GITLAB_CI ||
      !!env.CIRCLECI ||
      !!env.JENKINS_URL ||
      !!env.TRAVIS
    );
  }

  /**
   * True when a human can answer prompts: a TTY on stdin and not in CI.
   */
  static canPrompt(env: NodeJS.ProcessEnv = process.env): boolean {
    return !!process.stdin.isTTY && !this.isCiEnvironment(env);
  }
}
