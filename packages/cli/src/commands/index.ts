export { generateCode, CODE_TIMEOUT_MS, DEFAULT_OUTPUT } from './code.js';
export { runDemo, DEMO_MODEL, DEMO_TIMEOUT_MS } from './demo.js';
export { chatLoop, EXIT_COMMAND } from './chat.js';
export { modelsList, modelShow, modelCreate } from './models.js';
