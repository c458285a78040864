export { createPollCommand } from "./poll.js";
export { createStatusCommand } from "./status.js";
export { createCleanCommand } from "./clean.js";
export { createErrorsCommand } from "./errors.js";
export { createReposCommand } from "./repos.js";
