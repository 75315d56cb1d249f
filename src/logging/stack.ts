/**
 * Call-site resolution for log lines.
 *
 * Captures V8 call sites, walks them from the most recent frame outward and
 * picks the first frame after the logger's own frames. Logger frames are
 * recognized by module file, not by function name. parseStackFrame() covers
 * stack text for callers that only have a printed trace.
 */
import path from "node:path";
import { fileURLToPath } from "node:url";

export interface CallerFrame {
  /** V8 function name without `async ` or ` [as alias]`; may start with `new `. Empty when unnamed. */
  functionName: string;
  /** Absolute file path (file: URLs are converted). */
  fileName: string;
  lineNumber: number;
}

/** This module's file; always part of the logger component. */
export const STACK_MODULE_FILE = fileURLToPath(import.meta.url);

const FRAME_PREFIX = /^\s*at\s+/;
const NAMED_FRAME = /^(.*?) \((.*)\)$/;
const LOCATION = /^(.*):(\d+):(\d+)$/;

function toFilePath(location: string): string {
  if (!location.startsWith("file://")) return location;
  try {
    return fileURLToPath(location);
  } catch {
    return location;
  }
}

function cleanFunctionName(name: string): string {
  return name
    .replace(/^async /, "")
    .replace(/ \[as [^\]]+\]$/, "")
    .trim();
}

/**
 * Parse one line of a V8 stack trace.
 *
 * Returns undefined for the message line and for frames without a file
 * position (`native`, `<anonymous>`).
 */
export function parseStackFrame(line: string): CallerFrame | undefined {
  const prefix = FRAME_PREFIX.exec(line);
  if (!prefix) return undefined;

  const body = line.slice(prefix[0].length).trim();
  const named = NAMED_FRAME.exec(body);
  const functionName = named ? cleanFunctionName(named[1] ?? "") : "";
  const location = LOCATION.exec(named ? (named[2] ?? "") : body);
  if (!location) return undefined;

  return {
    functionName,
    fileName: toFilePath(location[1] ?? ""),
    lineNumber: Number(location[2]),
  };
}

/** Render a frame as `[SimpleName.functionName()]:line`. */
export function formatCallerTag(frame: CallerFrame): string {
  const moduleName = path.basename(frame.fileName, path.extname(frame.fileName));
  let simpleName = moduleName;
  let method = frame.functionName || "<anonymous>";

  if (method.startsWith("new ")) {
    simpleName = method.slice("new ".length).split(".").pop() || moduleName;
    method = "constructor";
  } else if (method.includes(".")) {
    const parts = method.split(".");
    method = parts[parts.length - 1] || "<anonymous>";
    simpleName = parts[parts.length - 2] || moduleName;
  }

  return `[${simpleName}.${method}()]:${frame.lineNumber}`;
}

/**
 * First frame outside the component, scanning only after the component's
 * own frames have been seen.
 */
function selectCallerFrame(
  frames: Iterable<CallerFrame | undefined>,
  isComponentFile: (fileName: string) => boolean,
): CallerFrame | undefined {
  let insideComponent = false;
  for (const frame of frames) {
    if (!frame) continue;
    if (isComponentFile(frame.fileName)) {
      insideComponent = true;
      continue;
    }
    if (insideComponent) return frame;
  }
  return undefined;
}

/** findCallerFrame() over the text of a V8 stack trace. */
export function findCallerFrame(
  stack: string,
  isComponentFile: (fileName: string) => boolean,
): CallerFrame | undefined {
  return selectCallerFrame(stack.split("\n").map(parseStackFrame), isComponentFile);
}

function isCallSite(value: unknown): value is NodeJS.CallSite {
  return (
    typeof value === "object" &&
    value !== null &&
    "getFileName" in value &&
    typeof value.getFileName === "function"
  );
}

/**
 * Structured frames of the current stack, most recent first, excluding this
 * function. Any `Error.prepareStackTrace` the host installed is bypassed for
 * the capture and restored afterwards.
 */
export function captureCallSites(): NodeJS.CallSite[] {
  const original = Error.prepareStackTrace;
  try {
    Error.prepareStackTrace = (_error, callSites) => callSites;
    const holder: { stack?: unknown } = {};
    Error.captureStackTrace(holder, captureCallSites);
    const { stack } = holder;
    return Array.isArray(stack) ? stack.filter(isCallSite) : [];
  } finally {
    Error.prepareStackTrace = original;
  }
}

/** Same naming V8 uses when it prints a frame. */
function toCallerFrame(site: NodeJS.CallSite): CallerFrame | undefined {
  const fileName = site.getFileName();
  const lineNumber = site.getLineNumber();
  if (!fileName || lineNumber === null) return undefined;

  const name = site.getFunctionName() ?? "";
  let functionName = name;
  if (site.isConstructor()) {
    functionName = `new ${name || "<anonymous>"}`;
  } else if (!site.isToplevel()) {
    const typeName = site.getTypeName();
    const method = name || site.getMethodName() || "";
    if (typeName && method) functionName = `${typeName}.${method}`;
  }

  return { functionName, fileName: toFilePath(fileName), lineNumber };
}

/** Caller tag for the current call stack, or "" when none can be resolved. */
export function captureCallerTag(componentFiles: ReadonlySet<string>): string {
  try {
    const frame = selectCallerFrame(captureCallSites().map(toCallerFrame), (fileName) =>
      componentFiles.has(fileName),
    );
    return frame ? formatCallerTag(frame) : "";
  } catch {
    return "";
  }
}
