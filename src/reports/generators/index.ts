/**
 * Report Generator Registry
 *
 * One entry per study kind, in letter order. Each entry is a set of pure
 * functions: record → metrics → full report / brief summary.
 */

import type { StudySnapshot } from "../../snapshot/schemas.js";
import type {
  CiedMetrics,
  EcgMetrics,
  EchoMetrics,
  FietstestMetrics,
  HolterMetrics,
  ReportTextKey,
  StudyKind,
} from "../../shared/types.js";
import { computeCiedMetrics } from "../../studies/cied.js";
import { computeEcgMetrics } from "../../studies/ecg.js";
import { computeEchoMetrics } from "../../studies/echo.js";
import { computeFietstestMetrics } from "../../studies/fietstest.js";
import { computeHolterMetrics } from "../../studies/holter.js";
import { generateCiedReport, summarizeCiedForBrief } from "./cied.js";
import { generateEcgReport, summarizeEcgForBrief } from "./ecg.js";
import { generateEchoReport, summarizeEchoForBrief } from "./echo.js";
import { generateFietstestReport, summarizeFietstestForBrief } from "./fietstest.js";
import { generateHolterReport, summarizeHolterForBrief } from "./holter.js";

export type StudyRecords = { [K in StudyKind]: NonNullable<StudySnapshot[K]> };

export interface StudyMetricsMap {
  echo: EchoMetrics;
  fietstest: FietstestMetrics;
  ecg: EcgMetrics;
  holter: HolterMetrics;
  cied: CiedMetrics;
}

export interface StudyReportGenerator<R, M> {
  title: string;
  fullKey: ReportTextKey;
  briefKey: ReportTextKey;
  computeMetrics: (record: R) => M;
  generateReport: (record: R, metrics: M) => string;
  summarizeForBrief: (record: R, metrics: M) => string;
}

export type ReportGeneratorMap = {
  [K in StudyKind]: StudyReportGenerator<StudyRecords[K], StudyMetricsMap[K]>;
};

export const REPORT_GENERATORS: ReportGeneratorMap = {
  ecg: {
    title: "ECG",
    fullKey: "full_ecg",
    briefKey: "brief_ecg",
    computeMetrics: computeEcgMetrics,
    generateReport: generateEcgReport,
    summarizeForBrief: summarizeEcgForBrief,
  },
  fietstest: {
    title: "Fietsproef",
    fullKey: "full_fietstest",
    briefKey: "brief_fietstest",
    computeMetrics: computeFietstestMetrics,
    generateReport: generateFietstestReport,
    summarizeForBrief: summarizeFietstestForBrief,
  },
  echo: {
    title: "Echocardiografie",
    fullKey: "full_echo",
    briefKey: "brief_echo",
    computeMetrics: computeEchoMetrics,
    generateReport: generateEchoReport,
    summarizeForBrief: summarizeEchoForBrief,
  },
  cied: {
    title: "Device uitlezing",
    fullKey: "full_cied",
    briefKey: "brief_cied",
    computeMetrics: computeCiedMetrics,
    generateReport: generateCiedReport,
    summarizeForBrief: summarizeCiedForBrief,
  },
  holter: {
    title: "Holter-monitoring",
    fullKey: "full_holter",
    briefKey: "brief_holter",
    computeMetrics: computeHolterMetrics,
    generateReport: generateHolterReport,
    summarizeForBrief: (record) => summarizeHolterForBrief(record),
  },
};

/** Letter order: ECG → fietsproef → echo → device → Holter. */
export const STUDY_ORDER: readonly StudyKind[] = ["ecg", "fietstest", "echo", "cied", "holter"];
