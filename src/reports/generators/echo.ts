/**
 * Echocardiography report and letter summary.
 *
 * Every label is the clinician's choice when one was entered and the
 * automatic classification otherwise; the form defaults cover the few fields
 * that have no automatic counterpart.
 */

import { aorticSegment } from "../../calculations/aorta.js";
import { DEFAULT_CVD } from "../../calculations/pulmonary_pressure.js";
import type { EchoRecord } from "../../snapshot/schemas.js";
import type { EchoMetrics } from "../../shared/types.js";
import { computeEchoMetrics } from "../../studies/echo.js";

// ── Form defaults ──────────────────────────────────────────────────

export const DEFAULT_AK_MORPHOLOGY = "Normale tricuspiede morfologie";
export const DEFAULT_AK_CALCIFICATION = "Geen calcificatie";
export const DEFAULT_AK_REGURGITATION = "Geen regurgitatie";
export const DEFAULT_IVC_DILATION = "niet gedilateerd";
export const DEFAULT_IVC_VARIATION = "met bewaarde ademhalingsvariatie";
export const DEFAULT_LA_LABEL = "Niet gedilateerd";

export const LFLG_NOTE =
  " (low-flow low-gradient patroon: AVA <1.0 cm² of indexed <0.6 cm²/m² met mean <40 mmHg en SVi <=35 mL/m²)";

export interface EchoLabels {
  lvHypertrophy: string;
  lvDilation: string;
  systolicFunction: string;
  diastolicFunction: string;
  laDilation: string;
  rvHypertrophy: string;
  rvDilation: string;
  rvFunction: string;
  raDilation: string;
  akMorphology: string;
  akCalcification: string;
  akStenosis: string;
  akRegurgitation: string;
  mkRegurgitation: string;
  tkRegurgitation: string;
  pkRegurgitation: string;
  ivcDilation: string;
  ivcVariation: string;
  cvd: string;
}

export function resolveEchoLabels(echo: EchoRecord, m: EchoMetrics): EchoLabels {
  return {
    lvHypertrophy: echo.lv_hypertrophy ?? m.lvHypertrophyAuto,
    lvDilation: echo.lv_dilation ?? m.lvDilationAuto,
    systolicFunction: echo.systolic_function ?? m.systolicFunctionAuto,
    diastolicFunction: echo.diastolic_function ?? m.diastolicFunctionAuto,
    laDilation: echo.la_dilation ?? m.laDilationAuto ?? DEFAULT_LA_LABEL,
    rvHypertrophy: echo.rv_hypertrophy ?? m.rvHypertrophyAuto,
    rvDilation: echo.rv_dilation ?? m.rvDilationAuto,
    rvFunction: echo.rv_function ?? m.rvFunctionAuto,
    raDilation: echo.ra_dilation ?? m.raDilationAuto,
    akMorphology: echo.ak_morphology ?? DEFAULT_AK_MORPHOLOGY,
    akCalcification: echo.ak_calcification ?? DEFAULT_AK_CALCIFICATION,
    akStenosis: echo.ak_stenosis ?? m.aorticStenosisAuto,
    akRegurgitation: echo.ak_regurgitation ?? DEFAULT_AK_REGURGITATION,
    mkRegurgitation: echo.mk_regurgitation ?? m.mitralRegurgitationAuto,
    tkRegurgitation: echo.tk_regurgitation ?? m.tricuspidRegurgitationAuto,
    pkRegurgitation: echo.pk_regurgitation ?? m.pulmonicRegurgitationAuto,
    ivcDilation: echo.ivc_dilation ?? DEFAULT_IVC_DILATION,
    ivcVariation: echo.ivc_variation ?? DEFAULT_IVC_VARIATION,
    cvd: echo.cvd ?? DEFAULT_CVD,
  };
}

// ── Report lines ───────────────────────────────────────────────────

function lvLine(echo: EchoRecord, m: EchoMetrics, l: EchoLabels): string {
  const parts: string[] = [l.lvHypertrophy];

  const meas: string[] = [];
  if (echo.ivsd !== undefined) meas.push(`IVSd ${echo.ivsd} mm`);
  if (echo.lvpw !== undefined) meas.push(`LVPWd ${echo.lvpw} mm`);
  if (m.lvMassIndex !== undefined) meas.push(`LVMI ${m.lvMassIndex} g/m²`);
  if (m.rwt !== undefined) meas.push(`RWT ${m.rwt}`);
  if (meas.length > 0) parts.push(`(${meas.join(", ")})`);

  parts.push(echo.lvidd !== undefined ? `${l.lvDilation} (LVIDd ${echo.lvidd} mm)` : l.lvDilation);

  const systolic = echo.lvef !== undefined ? `${l.systolicFunction} (LVEF ${echo.lvef}%)` : l.systolicFunction;
  parts.push(`met ${systolic}`);

  return `LV: ${parts.join(", ")}.`;
}

function diastolicLine(echo: EchoRecord, l: EchoLabels): string {
  const extras: string[] = [];
  if (echo.ea !== undefined) extras.push(`E/A ${echo.ea.toFixed(1)}`);
  if (echo.ee !== undefined) extras.push(`E/e' ${echo.ee.toFixed(1)}`);
  return extras.length > 0 ? `${l.diastolicFunction} (${extras.join(", ")}).` : `${l.diastolicFunction}.`;
}

function aortaLines(m: EchoMetrics): string[] {
  if (m.aorticSegments.length === 0) return [];
  const items: string[] = [];
  const abnormal: string[] = [];
  for (const seg of m.aorticSegments) {
    const mm = Math.round(seg.measuredMm);
    if (seg.indexedMmPerM2 === undefined) {
      items.push(`${seg.label} ${mm} mm`);
      continue;
    }
    const idx = seg.indexedMmPerM2.toFixed(1);
    items.push(`${seg.label} ${mm} mm, ${idx} mm/m²`);
    if (seg.dilated) abnormal.push(`${aorticSegment(seg.key).name} is gedilateerd (${mm} mm, ${idx} mm/m²).`);
  }
  const overall = abnormal.length > 0 ? "Aorta gedilateerd" : "Aorta niet gedilateerd";
  return [`AO: ${overall} (${items.join(", ")}).`, ...abnormal];
}

function rvLine(echo: EchoRecord, m: EchoMetrics, l: EchoLabels): string {
  const details: string[] = [];
  if (echo.rvfwd !== undefined) details.push(`RVFWd ${Math.round(echo.rvfwd)}mm`);
  if (echo.rvbd !== undefined) details.push(`RVBDd ${Math.round(echo.rvbd)}mm`);
  if (echo.rvmd !== undefined) details.push(`RVMDd ${Math.round(echo.rvmd)}mm`);
  const hypertrophy = details.length > 0 ? `${l.rvHypertrophy} (${details.join("; ")})` : l.rvHypertrophy;
  const tapse = echo.tapse !== undefined ? ` (TAPSE ${echo.tapse} mm)` : "";
  return `RV: ${hypertrophy}, ${l.rvDilation} met ${l.rvFunction}${tapse}. ${m.paspText}`;
}

function aorticValveLine(echo: EchoRecord, m: EchoMetrics, l: EchoLabels): string {
  const meas: string[] = [];
  if (echo.ak_vmax !== undefined) meas.push(`Vmax ${echo.ak_vmax.toFixed(2)} m/s`);
  if (echo.ak_mean !== undefined) meas.push(`MeanG ${Math.round(echo.ak_mean)} mmHg`);
  if (echo.ava !== undefined) {
    meas.push(
      m.avaIndex !== undefined
        ? `AVA ${echo.ava.toFixed(2)} cm², ${m.avaIndex.toFixed(2)} cm²/m²`
        : `AVA ${echo.ava.toFixed(2)} cm²`
    );
  }
  if (echo.sv !== undefined) {
    const sv = Math.round(echo.sv);
    meas.push(m.svi !== undefined ? `SV ${sv} mL, SVi ${m.svi.toFixed(1)} mL/m²` : `SV ${sv} mL`);
  }

  const note = m.lowFlowLowGradient ? LFLG_NOTE : "";
  let line = `AK: ${l.akMorphology}. ${l.akCalcification}. ${l.akStenosis}${note}`;
  if (meas.length > 0) line += ` (${meas.join(", ")})`;
  return `${line}. ${l.akRegurgitation}.`;
}

function regurgitantValveLine(prefix: string, label: string, meas: string[]): string {
  return meas.length > 0
    ? `${prefix}: Normale morfologie. ${label} (${meas.join(", ")}).`
    : `${prefix}: Normale morfologie. ${label}.`;
}

function regurgitantMeasurements(eroa?: number, regVol?: number, rf?: number): string[] {
  const meas: string[] = [];
  if (eroa !== undefined) meas.push(`EROA ${eroa.toFixed(2)} cm²`);
  if (regVol !== undefined) meas.push(`RegVol ${Math.round(regVol)} mL`);
  if (rf !== undefined) meas.push(`RF ${rf.toFixed(0)}%`);
  return meas;
}

/** Full echo report, one finding per line, blank lines between LV/RV/valve blocks. */
export function generateEchoReport(echo: EchoRecord, metrics: EchoMetrics = computeEchoMetrics(echo)): string {
  const l = resolveEchoLabels(echo, metrics);
  const report: string[] = [];

  report.push(lvLine(echo, metrics, l));
  report.push(diastolicLine(echo, l));
  report.push(metrics.lavi !== undefined ? `LA: ${l.laDilation}. (LAVI ${metrics.lavi} mL/m²).` : `LA: ${l.laDilation}.`);
  report.push(...aortaLines(metrics));
  report.push("");

  report.push(rvLine(echo, metrics, l));
  report.push(metrics.ravi !== undefined ? `RA: ${l.raDilation}. (RAVI ${metrics.ravi} mL/m²).` : `RA: ${l.raDilation}.`);
  report.push("");

  report.push(aorticValveLine(echo, metrics, l));
  report.push(regurgitantValveLine("MK", l.mkRegurgitation, regurgitantMeasurements(echo.mk_eroa, echo.mk_regvol, echo.mk_rf)));

  const tk = regurgitantMeasurements(echo.tk_eroa, echo.tk_regvol, echo.tk_rf);
  if (echo.tk_vcw !== undefined) tk.push(`VCW ${echo.tk_vcw.toFixed(2)} cm`);
  report.push(regurgitantValveLine("TK", l.tkRegurgitation, tk));

  const pk = regurgitantMeasurements(echo.pk_eroa, echo.pk_regvol, echo.pk_rf);
  if (echo.pk_dt !== undefined) pk.push(`DT ${Math.round(echo.pk_dt)} ms`);
  if (echo.pk_pht !== undefined) pk.push(`PHT ${Math.round(echo.pk_pht)} ms`);
  if (echo.pk_pr_index !== undefined) pk.push(`PR-index ${echo.pk_pr_index.toFixed(2)}`);
  report.push(regurgitantValveLine("PK", l.pkRegurgitation, pk));

  report.push("Pericardium is normaal zonder effusie.");
  report.push("Endocardium geen tekens van infectie.");
  report.push(`IVC is ${l.ivcDilation} ${l.ivcVariation}. CVD bedraagt ${l.cvd} mmHg.`);

  return report.join("\n");
}

// ── Brief ──────────────────────────────────────────────────────────

function hasEchoData(echo: EchoRecord): boolean {
  return Object.entries(echo).some(([key, value]) => key !== "patient" && value !== undefined);
}

function stripPeriod(text: string): string {
  return text.trim().replace(/\.+$/, "");
}

/**
 * One-paragraph echo summary for the consultation letter: function, chamber
 * sizes, valve findings and the pulmonary pressure.
 */
export function summarizeEchoForBrief(echo: EchoRecord, metrics: EchoMetrics = computeEchoMetrics(echo)): string {
  if (!hasEchoData(echo)) return "Geen echogegevens beschikbaar.";
  const l = resolveEchoLabels(echo, metrics);
  const parts: string[] = [];

  parts.push(echo.lvef !== undefined ? `${l.systolicFunction} LVEF ${echo.lvef.toFixed(0)}%` : l.systolicFunction);
  parts.push(`LV: ${l.lvDilation}`);
  if (echo.la_dilation !== undefined || metrics.laDilationAuto !== undefined) parts.push(`LA: ${l.laDilation}`);
  parts.push(`AK: ${l.akStenosis}`);
  if (echo.mk_regurgitation !== undefined || metrics.mitralScore > 0) parts.push(`MK: ${l.mkRegurgitation}`);
  if (echo.tk_regurgitation !== undefined || metrics.tricuspidScore > 0) parts.push(`TK: ${l.tkRegurgitation}`);
  if (echo.pk_regurgitation !== undefined || metrics.pulmonicScore > 0) parts.push(`PK: ${l.pkRegurgitation}`);
  if (echo.pasp_raw !== undefined) parts.push(metrics.paspText);

  return `${parts.map(stripPeriod).join("; ")}.`;
}
