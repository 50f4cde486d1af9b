/**
 * Main entry point - exports all public APIs
 */

export {
    PipelineOrchestrator,
    PipelineOptions,
    PipelineResult,
    PipelineState,
    SessionContext,
} from './pipeline_orchestrator';
export { RecoveryOrchestrator, RecoveryDecision, RecoveryEvaluation } from './recovery_orchestrator';
export { ModelRouter, ModelRouterConfig, Oracle, FetchLike } from './model_router';
export {
    ArchitectureGraph,
    Component,
    ComponentType,
    Connection,
    BlockPosition,
    InputKind,
    KnownComponentKind,
    COMPONENT_KINDS,
    parseComponentType,
    componentTypeName,
} from './graph_types';
export { sanitizeIdentifier, sanitizeLabel } from './identifier_sanitizer';
export { validateArchitecture, toArchitectureGraph, ValidationResult, DEFAULT_SYSTEM_NAME } from './schema_validator';
export { buildPrompt, PromptOptions } from './prompts';
export { detectInputKind, parseInputKind } from './input_kind';
export { extractArchitecture, ExtractionResult, ExtractionStrategy } from './response_extractor';
export { renderDiagram, renderDiagramReport, DiagramReport } from './diagram_renderer';
export { renderBuildScript, renderBuildScriptReport, BuildScriptOptions, BuildScriptReport } from './build_script_renderer';
export { buildDiagramImageUrl, DiagramUrlResult } from './diagram_url';
export { serializeGraph, parseGraphFile, readGraphFile, toWireGraph, WireGraph } from './graph_file';
export { writeArtifacts, PipelineArtifacts, WrittenArtifacts } from './output_writer';
export { RunHistory, RunRecord, InMemoryRunHistory, JsonlRunHistory, parseRunRecord } from './run_history';
export { DocumentExtractor, FileDocumentExtractor, SourceFile, readSourceFile } from './document_extractor';
export {
    StructuredError,
    ErrorCode,
    RecoveryOption,
    OracleError,
    DocumentExtractionError,
    ErrorFactory,
} from './structured_error';
export { ConfigError, SessionConfig, loadSessionConfig } from './config';
export { createLogger, Logger } from './logger';
