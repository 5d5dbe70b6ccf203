/**
 * LLM Provider Credentials
 *
 * Reads API keys for the LLM providers the resume agents call. Keys are
 * read here, at the point where an operation is built, and passed on
 * explicitly; RetryingCaller never touches the environment.
 *
 * Environment Variables:
 * - OPENAI_API_KEY - OpenAI (resume parser, resume matcher)
 * - GEMINI_API_KEY - Google Gemini (resume analyzer)
 */

export type LlmProvider = 'openai' | 'gemini';

export const LLM_API_KEY_ENV_VARS: Readonly<Record<LlmProvider, string>> = {
  openai: 'OPENAI_API_KEY',
  gemini: 'GEMINI_API_KEY',
};

/**
 * Error thrown when a provider's API key is not configured
 */
export class LlmApiKeyMissingError extends Error {
  constructor(
    public readonly provider: LlmProvider,
    public readonly envVar: string = LLM_API_KEY_ENV_VARS[provider]
  ) {
    super(
      `${envVar} environment variable is not set. ` +
        `Set it before creating ${provider} operations.`
    );
    this.name = 'LlmApiKeyMissingError';
  }
}

/**
 * Get the API key for a provider
 *
 * @param provider - LLM provider
 * @param env - Environment to read from
 * @returns The key with surrounding whitespace removed
 * @throws LlmApiKeyMissingError if the variable is unset or blank
 */
export function getLlmApiKey(
  provider: LlmProvider,
  env: NodeJS.ProcessEnv = process.env
): string {
  const envVar = LLM_API_KEY_ENV_VARS[provider];
  const apiKey = env[envVar]?.trim();

  if (!apiKey) {
    throw new LlmApiKeyMissingError(provider, envVar);
  }

  return apiKey;
}

export function isLlmApiKeyConfigured(
  provider: LlmProvider,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  return Boolean(env[LLM_API_KEY_ENV_VARS[provider]]?.trim());
}
