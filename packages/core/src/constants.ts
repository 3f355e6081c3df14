/**
 * Shared defaults for the generation and diagnosis pipelines.
 *
 * Keep these values in a single module so prompt builders, the gateway and
 * tests stay aligned when defaults change.
 */

export const THINK_OPEN_TAG = '<think>';
export const THINK_CLOSE_TAG = '</think>';

export const GENERATION_MAX_TOKENS = 512;
export const DIAGNOSIS_MAX_TOKENS = 1024;

export const COMMAND_HISTORY_CAPACITY = 20;

export const DEFAULT_LOCAL_MODEL = 'llama3:8b-instruct-q4_1';
export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';
export const DEFAULT_API_PROVIDER = 'groq';
export const MODEL_TEMPERATURE = 0.1;
