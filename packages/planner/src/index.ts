export { PlanCompiler } from './compiler.js';
export type { CompiledPlan, PlanCompilerOptions, Retriever } from './compiler.js';
export { parsePlan, formatIssues } from './parse.js';
export type { ParsedPlan } from './parse.js';
export { renderContext, unseenReferences } from './context.js';
