/**
 * Result Aggregator: condenses externally produced test result documents.
 *
 * Two document formats are read, chosen by extension:
 *   - `.xml`  JUnit XML (`<testsuites>` or a single `<testsuite>` root)
 *   - `.json` `{ "suite": "...", "cases": [{ "name", "classname"?, "status", "message"? }] }`
 *
 * The orchestrator never writes result documents itself; it only reads them
 * and writes condensed failure reports.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { XMLParser } from "fast-xml-parser";
import { AggregateTestFailure, TestResultFormatError } from "./errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CaseStatus = "pass" | "failure" | "error" | "skipped";

export type TestCaseResult = {
  name: string;
  classname?: string;
  status: CaseStatus;
  message?: string;
};

export type TestSuiteResult = {
  suite: string;
  cases: TestCaseResult[];
};

export type FailedCase = {
  suite: string;
  name: string;
  classname?: string;
  status: "failure" | "error";
  message?: string;
};

/** Condensed view of one result document: failing and erroring cases only. */
export type FailureReport = {
  suite: string;
  source: string;
  total: number;
  failures: FailedCase[];
};

export type AggregateOutcome = {
  ok: boolean;
  reports: FailureReport[];
  failures: FailedCase[];
  /** Paths that did not exist; tolerated as "no results". */
  missing: string[];
  /** Set when `ok` is false; names at least one failing case. */
  message?: string;
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asList(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (name) => name === "testsuite" || name === "testcase" || name === "failure" || name === "error",
});

/** Message of a `<failure>` or `<error>` element: its attribute, else its text. */
function elementMessage(element: unknown): string | undefined {
  if (typeof element === "string") return optionalString(element);
  if (!isRecord(element)) return undefined;
  return optionalString(element["@_message"]) ?? optionalString(element["#text"]);
}

function junitCase(testcase: Record<string, unknown>, suiteName: string | undefined): TestCaseResult {
  const name = optionalString(testcase["@_name"]) ?? "(unnamed)";
  const classname = optionalString(testcase["@_classname"]) ?? suiteName;

  const failure = asList(testcase.failure)[0];
  if (testcase.failure !== undefined) {
    return { name, classname, status: "failure", message: elementMessage(failure) };
  }
  const error = asList(testcase.error)[0];
  if (testcase.error !== undefined) {
    return { name, classname, status: "error", message: elementMessage(error) };
  }
  if (testcase.skipped !== undefined) {
    return { name, classname, status: "skipped", message: elementMessage(testcase.skipped) };
  }
  return { name, classname, status: "pass" };
}

function collectJunitSuites(node: Record<string, unknown>, out: Array<{ name?: string; cases: TestCaseResult[] }>): void {
  for (const suite of asList(node.testsuite)) {
    if (!isRecord(suite)) continue;
    const name = optionalString(suite["@_name"]);
    const cases = asList(suite.testcase)
      .filter(isRecord)
      .map((tc) => junitCase(tc, name));
    out.push({ name, cases });
    collectJunitSuites(suite, out);
  }
}

export function parseJunitXml(xml: string, path: string): TestSuiteResult {
  let doc: unknown;
  try {
    doc = xmlParser.parse(xml, true);
  } catch (err) {
    throw new TestResultFormatError(path, err instanceof Error ? err.message : String(err));
  }
  if (!isRecord(doc)) throw new TestResultFormatError(path, "not an XML document");

  const suites: Array<{ name?: string; cases: TestCaseResult[] }> = [];
  let rootName: string | undefined;
  if (doc.testsuites !== undefined) {
    const root = isRecord(doc.testsuites) ? doc.testsuites : {};
    rootName = optionalString(root["@_name"]);
    collectJunitSuites(root, suites);
  } else if (doc.testsuite !== undefined) {
    collectJunitSuites(doc, suites);
  } else {
    throw new TestResultFormatError(path, "expected a <testsuites> or <testsuite> root element");
  }

  return {
    suite: rootName ?? suites.find((s) => s.name)?.name ?? basename(path, extname(path)),
    cases: suites.flatMap((s) => s.cases),
  };
}

const JSON_STATUS: Record<string, CaseStatus> = {
  pass: "pass",
  passed: "pass",
  success: "pass",
  ok: "pass",
  failure: "failure",
  failed: "failure",
  fail: "failure",
  error: "error",
  errored: "error",
  skipped: "skipped",
  skip: "skipped",
};

export function parseJsonResults(text: string, path: string): TestSuiteResult {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    throw new TestResultFormatError(path, err instanceof Error ? err.message : String(err));
  }
  if (!isRecord(doc) || !Array.isArray(doc.cases)) {
    throw new TestResultFormatError(path, 'expected an object with a "cases" array');
  }

  const cases = doc.cases.map((entry: unknown, i: number): TestCaseResult => {
    if (!isRecord(entry)) throw new TestResultFormatError(path, `case ${i} is not an object`);
    const name = optionalString(entry.name);
    if (!name) throw new TestResultFormatError(path, `case ${i} has no name`);
    const rawStatus = typeof entry.status === "string" ? entry.status.toLowerCase() : "";
    const status = JSON_STATUS[rawStatus];
    if (!status) throw new TestResultFormatError(path, `case "${name}" has unknown status "${String(entry.status)}"`);
    return {
      name,
      classname: optionalString(entry.classname),
      status,
      message: optionalString(entry.message),
    };
  });

  return { suite: optionalString(doc.suite) ?? basename(path, extname(path)), cases };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/** Read a result document, or undefined when the file does not exist. */
export async function readSuiteResult(path: string): Promise<TestSuiteResult | undefined> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
  return extname(path).toLowerCase() === ".json" ? parseJsonResults(text, path) : parseJunitXml(text, path);
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

/**
 * Condense one result document to its failing and erroring cases.
 * Returns undefined when the file does not exist.
 */
export async function condense(path: string): Promise<FailureReport | undefined> {
  const result = await readSuiteResult(path);
  if (!result) return undefined;

  const failures: FailedCase[] = [];
  for (const c of result.cases) {
    if (c.status !== "failure" && c.status !== "error") continue;
    failures.push({
      suite: result.suite,
      name: c.name,
      ...(c.classname !== undefined ? { classname: c.classname } : {}),
      status: c.status,
      ...(c.message !== undefined ? { message: c.message } : {}),
    });
  }

  return { suite: result.suite, source: path, total: result.cases.length, failures };
}

const NAMED_IN_MESSAGE = 5;

export function formatFailedCase(failure: FailedCase): string {
  return `${failure.suite}::${failure.name}`;
}

/** One-line summary naming the first few failing cases. */
export function summarizeFailures(failures: readonly FailedCase[]): string {
  const named = failures.slice(0, NAMED_IN_MESSAGE).map(formatFailedCase).join(", ");
  const rest = failures.length - NAMED_IN_MESSAGE;
  const suites = new Set(failures.map((f) => f.suite)).size;
  return `${failures.length} failing test case(s) in ${suites} suite(s): ${named}${rest > 0 ? `, and ${rest} more` : ""}`;
}

/**
 * Condense every path and union the failures. Missing files are listed in
 * `missing` and never fail the check on their own.
 */
export async function checkAllSuites(paths: readonly string[]): Promise<AggregateOutcome> {
  const reports: FailureReport[] = [];
  const missing: string[] = [];

  for (const path of paths) {
    const report = await condense(path);
    if (report) reports.push(report);
    else missing.push(path);
  }

  const failures = reports.flatMap((r) => r.failures);
  if (failures.length === 0) {
    return { ok: true, reports, failures, missing };
  }
  return { ok: false, reports, failures, missing, message: summarizeFailures(failures) };
}

/** Like {@link checkAllSuites}, but throws {@link AggregateTestFailure} on any failure. */
export async function assertAllSuitesPass(paths: readonly string[]): Promise<AggregateOutcome> {
  const outcome = await checkAllSuites(paths);
  if (!outcome.ok) {
    throw new AggregateTestFailure(outcome.message ?? summarizeFailures(outcome.failures), outcome.failures);
  }
  return outcome;
}

function reportFileName(suite: string): string {
  const safe = suite.replace(/[^A-Za-z0-9._-]+/g, "_").replace(/^_+|_+$/g, "");
  return `${safe || "suite"}-failures.json`;
}

/** Write a condensed report as JSON into `resultsDir`. Returns the file path. */
export async function writeFailureReport(report: FailureReport, resultsDir: string): Promise<string> {
  await mkdir(resultsDir, { recursive: true });
  const path = join(resultsDir, reportFileName(report.suite));
  await writeFile(path, JSON.stringify(report, null, 2) + "\n", "utf-8");
  return path;
}
