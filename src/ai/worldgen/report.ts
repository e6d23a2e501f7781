/**
 * Cumulative generation report.
 *
 * Every failure at every stage becomes one entry; the orchestrator returns
 * the full list at the end of a run alongside the run status.
 */

export type ReportKind = "transport" | "parse" | "schema" | "integrity" | "storage" | "cancelled" | "internal";
export type ReportSeverity = "error" | "warning";

export type GenerationStage =
  | "outline"
  | "graph"
  | "locations"
  | "quests"
  | "enemies"
  | "items"
  | "validate"
  | "persist"
  | "run";

export interface ReportEntry {
  kind: ReportKind;
  severity: ReportSeverity;
  stage: GenerationStage;
  artifactId?: string;
  message: string;
}

export type RunStatus = "completed" | "aborted";

export interface ArtifactCounts {
  chapters: number;
  rooms: number;
  quests: number;
  enemies: number;
  items: number;
}

export interface GenerationReport {
  status: RunStatus;
  storyId: string;
  chapterIds: string[];
  entries: ReportEntry[];
  errorCount: number;
  warningCount: number;
  tokensUsed: number;
  counts: ArtifactCounts;
  outputPath?: string;
  abortReason?: string;
}

export function reportError(
  kind: ReportKind,
  stage: GenerationStage,
  message: string,
  artifactId?: string
): ReportEntry {
  return { kind, severity: "error", stage, message, ...(artifactId ? { artifactId } : {}) };
}

export function reportWarning(
  kind: ReportKind,
  stage: GenerationStage,
  message: string,
  artifactId?: string
): ReportEntry {
  return { kind, severity: "warning", stage, message, ...(artifactId ? { artifactId } : {}) };
}

/** Expands validator output into one entry per message. */
export function entriesFromMessages(
  kind: ReportKind,
  stage: GenerationStage,
  messages: { errors: string[]; warnings: string[] },
  artifactId?: string
): ReportEntry[] {
  return [
    ...messages.errors.map((m) => reportError(kind, stage, m, artifactId)),
    ...messages.warnings.map((m) => reportWarning(kind, stage, m, artifactId)),
  ];
}

export function formatReportEntry(entry: ReportEntry): string {
  const subject = entry.artifactId ? ` ${entry.artifactId}:` : "";
  return `[${entry.severity}] ${entry.kind}/${entry.stage}${subject} ${entry.message}`;
}

export function countBySeverity(entries: ReportEntry[]): { errorCount: number; warningCount: number } {
  const errorCount = entries.filter((e) => e.severity === "error").length;
  return { errorCount, warningCount: entries.length - errorCount };
}
