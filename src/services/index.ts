export { GeminiService, toInlineParts, normalizeGeminiError } from './gemini.service.js';

export { PopplerPageRenderer, execFileRunner, describeRenderFailure } from './pdf.renderer.js';
export type { CommandRunner, CommandResult } from './pdf.renderer.js';

export { FilePlacementService, assertInsideDirectory } from './file-placement.service.js';
export { ResultsStore } from './results.store.js';
