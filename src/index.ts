export * from "./shared/types.js";
export * from "./shared/hash.js";
export * from "./shared/parse.js";
export * from "./shared/format.js";
export * from "./shared/report_config.js";

export * from "./calculations/stats.js";
export * from "./calculations/body.js";
export * from "./calculations/left_ventricle.js";
export * from "./calculations/chambers.js";
export * from "./calculations/valves.js";
export * from "./calculations/aorta.js";
export * from "./calculations/pulmonary_pressure.js";
export * from "./calculations/exercise.js";
export * from "./calculations/ecg_intervals.js";
export * from "./calculations/pacing.js";

export * from "./snapshot/schemas.js";
export * from "./snapshot/snapshot.js";

export * from "./studies/echo.js";
export * from "./studies/fietstest.js";
export * from "./studies/ecg.js";
export * from "./studies/holter.js";
export * from "./studies/cied.js";

export * from "./reports/generators/index.js";
export * from "./reports/generators/echo.js";
export * from "./reports/generators/fietstest.js";
export * from "./reports/generators/ecg.js";
export * from "./reports/generators/holter.js";
export * from "./reports/generators/cied.js";
export * from "./reports/recommendations.js";
export * from "./reports/letter.js";
export * from "./reports/letter_document.js";
export * from "./reports/brief_sections.js";
export * from "./reports/orchestrator.js";

export * from "./ingest/measurement_sheet.js";
export * from "./trace/derivation.js";
export * from "./trace/exporters.js";
export * from "./exports/docx.js";
export * from "./exports/bundle.js";
