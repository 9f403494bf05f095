export const OPENAI_API_KEY_ENV_VAR = 'OPENAI_API_KEY';
export const BASE_URL_ENV_VAR = 'BASE_URL';
export const DEFAULT_MODEL_NAME = 'gpt-4o-mini';
export const DEFAULT_EMBEDDINGS_MODEL_NAME = 'text-embedding-3-small';
