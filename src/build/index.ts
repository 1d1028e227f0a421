/**
 * graphbuild engine: public API.
 */

// Types
export type {
  TaskState, TaskAction, ExecAction, CallAction, FetchAction, StageAction,
  DeleteAction, MkdirAction, CheckTestsAction, EchoAction,
  TaskDefinition, AliasDefinition,
  ProcessFailureClass, TaskFailureClass, TaskFailure, TaskRecord,
  BuildStatus, FailureSummary, BuildResult,
  BuildEvent, BuildEventKind,
  Diagnostic, Severity,
} from "./types.js";
export { TERMINAL_STATES } from "./types.js";

export type {
  BuildDefinition, PropertyDeclaration, ValueDeclaration, EnvDeclaration,
  VariantDeclaration, EnvironmentDeclaration, RequiredProperty,
} from "./buildfile-types.js";

// Errors
export {
  BuildError, MissingPropertyError, ConditionEvaluationError, ConditionSyntaxError,
  SubprocessFailure, CyclicDependencyError, AggregateTestFailure, TestResultFormatError,
  BuildFileError, UnknownTaskError, BuildValidationError, describeError,
} from "./errors.js";
export type { BuildErrorCode } from "./errors.js";

// Properties, platform, conditions
export { PropertyStore } from "./properties.js";
export type { PlatformFacts, PlatformTag } from "./platform.js";
export { detectPlatform, platformTag, isFamily, isArch, normalizeArch, KNOWN_FAMILIES } from "./platform.js";
export type { Condition, ConditionEnv } from "./conditions.js";
export {
  all, any, not, osFamily, osArch, fileExists, isSet, equals,
  parseCondition, evaluateCondition, describeCondition,
} from "./conditions.js";

// Graph & validation
export { TaskGraph } from "./graph.js";
export type { AliasResolution } from "./graph.js";
export { validate, validateOrRaise } from "./validator.js";
export { graphToDot } from "./graph-to-dot.js";
export type { GraphToDotOptions } from "./graph-to-dot.js";

// Build files
export { parseBuildFile, parseDuration } from "./buildfile-parser.js";
export type { ParseOptions } from "./buildfile-parser.js";
export { loadBuildFile, resolveProperties } from "./loader.js";
export type { ResolveOptions } from "./loader.js";
export {
  resolveBuildFile, BuildFileResolutionError, BUILD_FILE_NAME, BUILD_FILE_ENV,
} from "./buildfile-resolution.js";
export type { ResolveBuildFileOptions } from "./buildfile-resolution.js";

// Execution
export { BuildExecutor, runBuild, resolveTargets, invocationKey, describeAction } from "./executor.js";
export type { BuildConfig, ExecutorConfig, Downloader } from "./executor.js";
export { defaultProcessRunner, KILL_GRACE_MS } from "./process-runner.js";
export type { ProcessInvocation, ProcessResult, ProcessRunner } from "./process-runner.js";
export {
  classifyResult, buildDigest, extractTail, extractFirstFailingCheck, extractTestSummary,
  formatCommand, isTestRunnerCommand, toSubprocessFailure,
} from "./process-failure.js";

// Test results & staging
export {
  parseJunitXml, parseJsonResults, readSuiteResult, condense, checkAllSuites,
  assertAllSuitesPass, writeFailureReport, summarizeFailures, formatFailedCase,
} from "./test-results.js";
export type {
  CaseStatus, TestCaseResult, TestSuiteResult, FailedCase, FailureReport, AggregateOutcome,
} from "./test-results.js";
export { ensurePresent, stage, download, removePath, makeDirectory, pathExists, wildcardMatcher } from "./stager.js";
export type { StageOptions, StageResult, DownloadOptions } from "./stager.js";
