/**
 * Configuration exports for resume-agent-services
 */

export {
  LLM_API_KEY_ENV_VARS,
  LlmApiKeyMissingError,
  getLlmApiKey,
  isLlmApiKeyConfigured,
  type LlmProvider,
} from './llm.js';

export { RETRY_POLICY_ENV_VARS, getRetryPolicyFromEnv } from './retry.js';
