export { runReviewPipeline } from './pipeline/runReviewPipeline';
export type { PipelineDeps, PipelineInput } from './pipeline/runReviewPipeline';
export { analyzePaper } from './pipeline/analyzePaper';
export { buildCitation } from './pipeline/buildCitation';
export { synthesizeReview, packBatches } from './pipeline/synthesizeReview';
export { assembleReview } from './pipeline/assembleReview';
export { formatRunReport } from './pipeline/report';
export { loadReviewConfig } from './agents/config';
export type { ReviewConfig, AgentConfig } from './agents/config';
export type { TextGenerationService, GenerationRequest, TextServices } from './agents/textService';
export { GeminiTextService, createTextServices } from './services/geminiService';
export { extractPdfText } from './utils/paperParser';
export { formatApaCitation } from './utils/apa';
export * from './agents/errors';
export * from './pipeline/types';
