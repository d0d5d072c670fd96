/**
 * Main entry point - exports all public APIs
 */

export * from './index_codec';
export {
    classifyOutcomes,
    decideAction,
    failureKindOf,
    parseReturnCode,
    DEFAULT_RULES,
} from './outcome_classifier';
export type {
    ClassificationResult,
    ClassificationRules,
    ExitCodeRules,
    FailureKind,
    RawTaskResult,
    StateAction,
    StateRule,
    TaskAction,
    TaskOutcome,
} from './outcome_classifier';
export * from './chain_types';
export * from './checkpoint_store';
export { EscalationEngine, escalationReasonOf } from './escalation_engine';
export type {
    ChainListing,
    CreateChainOptions,
    EscalateInput,
    EscalationEngineOptions,
    RecordRoundInput,
    TransitionEvent,
    TransitionKind,
} from './escalation_engine';
export { planNextStep, applyPlan, failureReasonOf, renderPlanShellVars } from './escalation_planner';
export type { EscalationPlan, CompletePlan, FailPlan, EscalatePlan, PlanCounts, RetrySubmission } from './escalation_planner';
export { parseRuleConfig, loadRuleConfig, resolveCheckpointDir, renderConfigShellVars } from './rule_config';
export type { RuleConfig, TrackerConfig, AuditLoggingConfig, ClusterConfig } from './rule_config';
export {
    SchedulerClient,
    spawnCommandRunner,
    parseAccountingLine,
    parseAccountingOutput,
    toRawTaskResults,
} from './scheduler_client';
export type { CommandResult, CommandRunner, SchedulerClientOptions, TaskRecord } from './scheduler_client';
export { AuditStore, attachAuditTrail } from './audit_store';
export type { ActionEntry, ActionRow, AuditStoreOptions, AuditTrailOptions, RoundExtras, RoundOutcome } from './audit_store';
export { renderStatus, renderCheckpointList, renderMarkdownReport, renderResumeVars, resultBreakdown } from './report';
export type { StatusOptions, ReportOptions } from './report';
export { ShellVars, shellQuote, shellAssign, shellArrayAssign } from './shell_vars';
export type { ShellValue } from './shell_vars';
export { EscalationError, ErrorFactory, ERRORS, isEscalationError, describeError, getSeverity } from './structured_error';
export type { ErrorCode, Severity, StructuredError } from './structured_error';
export { SchemaValidator, formatValidationErrors } from './schema_validator';
export type { ValidationResult, JsonSchema } from './schema_validator';
export { createLogger, setCorrelation, clearCorrelation } from './logger';
export type { Logger, LogLevel } from './logger';
export { EscalateCLI } from './cli';
