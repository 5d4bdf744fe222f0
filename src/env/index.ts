export { applyEnv, loadEnvFile, parseAssignments, remainingEnv, type EnvEntry } from './env.js';
export { EnvAssignmentError, EnvFileError } from './errors.js';
