export { ANALYSIS_PROMPT } from './analysis';
export { CITATION_PROMPT } from './citation';
export { buildSynthesisPrompt, buildReductionPrompt } from './synthesis';
