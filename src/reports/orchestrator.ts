/**
 * Report orchestration: for each study on a snapshot, in letter order,
 * metrics → full report → brief summary (and guideline advice for echo).
 * The texts land on a copy of the snapshot under their fixed keys.
 */

import { contentHash } from "../shared/hash.js";
import type { StudySnapshot } from "../snapshot/schemas.js";
import { snapshotFingerprint, withReportTexts } from "../snapshot/snapshot.js";
import type { ReportTextKey, StudyKind } from "../shared/types.js";
import type { DerivationRecorder } from "../trace/derivation.js";
import { REPORT_GENERATORS, STUDY_ORDER, type StudyMetricsMap, type StudyRecords } from "./generators/index.js";
import { generateGuidelineRecommendations } from "./recommendations.js";

export interface GenerateReportsOptions {
  recorder?: DerivationRecorder;
}

export interface StudyReportResult {
  snapshot: StudySnapshot;
  metrics: Partial<StudyMetricsMap>;
  /** Guideline advice for the echo study; empty when none applies. */
  recommendations: string[];
  /** Keys written during this run, in generation order. */
  generatedKeys: ReportTextKey[];
}

/** Formulas each study's aggregator applies, for the derivation trace. */
const STUDY_FORMULAS: Record<StudyKind, string[]> = {
  ecg: ["QTc Bazett", "QTc Fridericia", "QRS axis classification"],
  fietstest: ["VO2 from watts", "VO2 reference percentile", "predicted wattage", "predicted max heart rate"],
  echo: [
    "Mosteller BSA",
    "Devereux LV mass",
    "relative wall thickness",
    "Teichholz ejection fraction",
    "aortic predicted range",
    "aortic stenosis grading",
    "regurgitation severity",
    "PASP from TR gradient",
  ],
  cied: ["myPACE lower rate", "upper tracking rate", "rate-adaptive AV delay", "PVARP"],
  holter: ["Holter rhythm flags"],
};

interface StudyTexts<M> {
  metrics: M;
  full: string;
  brief: string;
}

function runStudy<K extends StudyKind>(
  kind: K,
  record: StudyRecords[K],
  recorder: DerivationRecorder | undefined
): StudyTexts<StudyMetricsMap[K]> {
  const generator = REPORT_GENERATORS[kind];
  const source = [{ sourceId: kind, sourceHash: contentHash(record), sourceType: `${kind}_record` }];

  let started = new Date();
  const metrics = generator.computeMetrics(record);
  recorder?.record({
    traceType: "METRICS_COMPUTATION",
    initiatedAt: started,
    completedAt: new Date(),
    inputLineage: { sources: source },
    formulas: STUDY_FORMULAS[kind].map((name) => ({ name, parameters: { study: kind } })),
    outputContent: { study: kind, summaryLines: metrics.summaryLines },
  });

  started = new Date();
  const full = generator.generateReport(record, metrics);
  recorder?.record({
    traceType: "REPORT_COMPOSITION",
    initiatedAt: started,
    completedAt: new Date(),
    inputLineage: { sources: source },
    outputContent: { key: generator.fullKey, textHash: contentHash(full), lineCount: full.split("\n").length },
  });

  started = new Date();
  const brief = generator.summarizeForBrief(record, metrics);
  recorder?.record({
    traceType: "BRIEF_COMPOSITION",
    initiatedAt: started,
    completedAt: new Date(),
    inputLineage: { sources: source },
    outputContent: { key: generator.briefKey, textHash: contentHash(brief) },
  });

  return { metrics, full, brief };
}

export function generateStudyReports(
  snapshot: StudySnapshot,
  options: GenerateReportsOptions = {}
): StudyReportResult {
  const { recorder } = options;
  const texts: Partial<Record<ReportTextKey, string>> = {};
  const generatedKeys: ReportTextKey[] = [];
  const metrics: Partial<StudyMetricsMap> = {};
  let recommendations: string[] = [];

  const present = STUDY_ORDER.filter((kind) => snapshot[kind] !== undefined);
  recorder?.record({
    traceType: "SNAPSHOT_VALIDATION",
    initiatedAt: new Date(),
    completedAt: new Date(),
    inputLineage: {
      sources: [{ sourceId: "snapshot", sourceHash: snapshotFingerprint(snapshot), sourceType: "study_snapshot" }],
    },
    outputContent: { studies: present },
    validationResults: {
      pass: present.length > 0,
      messages: present.length > 0 ? [] : ["Snapshot contains no study records"],
    },
  });

  const store = <K extends StudyKind>(kind: K, result: StudyTexts<StudyMetricsMap[K]>) => {
    const generator = REPORT_GENERATORS[kind];
    texts[generator.fullKey] = result.full;
    texts[generator.briefKey] = result.brief;
    generatedKeys.push(generator.fullKey, generator.briefKey);
    return result.metrics;
  };

  for (const kind of STUDY_ORDER) {
    switch (kind) {
      case "ecg":
        if (snapshot.ecg) metrics.ecg = store("ecg", runStudy("ecg", snapshot.ecg, recorder));
        break;
      case "fietstest":
        if (snapshot.fietstest) {
          metrics.fietstest = store("fietstest", runStudy("fietstest", snapshot.fietstest, recorder));
        }
        break;
      case "echo":
        if (snapshot.echo) {
          metrics.echo = store("echo", runStudy("echo", snapshot.echo, recorder));
          const started = new Date();
          recommendations = generateGuidelineRecommendations(snapshot.echo);
          recorder?.record({
            traceType: "GUIDELINE_EVALUATION",
            initiatedAt: started,
            completedAt: new Date(),
            inputLineage: {
              sources: [{ sourceId: "echo", sourceHash: contentHash(snapshot.echo), sourceType: "echo_record" }],
            },
            reasoningChain: {
              steps: recommendations.map((detail, i) => ({ stepNumber: i + 1, action: "recommend", detail })),
            },
            outputContent: { count: recommendations.length },
          });
        }
        break;
      case "cied":
        if (snapshot.cied) metrics.cied = store("cied", runStudy("cied", snapshot.cied, recorder));
        break;
      case "holter":
        if (snapshot.holter) metrics.holter = store("holter", runStudy("holter", snapshot.holter, recorder));
        break;
    }
  }

  const updatedTexts: Record<string, string> = {};
  for (const key of generatedKeys) {
    const text = texts[key];
    if (text !== undefined) updatedTexts[key] = text;
  }

  return {
    snapshot: withReportTexts(snapshot, updatedTexts),
    metrics,
    recommendations,
    generatedKeys,
  };
}
