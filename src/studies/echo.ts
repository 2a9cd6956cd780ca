import {
  AORTIC_SEGMENTS,
  assessAorticSegment,
  type BodyDimensions,
} from "../calculations/aorta.js";
import {
  RV_FUNCTION_GOOD,
  classifyLavi,
  classifyTapse,
  suggestRaDilation,
  suggestRvDilation,
  suggestRvHypertrophy,
} from "../calculations/chambers.js";
import {
  LVIDS_LABELS,
  classifyIvsd,
  classifyLvef,
  classifyLvidd,
  classifyLvids,
  computeLvMassG,
  computeRwt,
  determineLvGeometry,
  lvMassIndexSeverity,
  suggestDiastolicFunction,
  systolicFunctionPhrase,
  teichholzEjectionFraction,
} from "../calculations/left_ventricle.js";
import { DEFAULT_CVD, paspText } from "../calculations/pulmonary_pressure.js";
import { indexToBsa, indexToFlooredBsa } from "../calculations/stats.js";
import {
  gradeAorticStenosis,
  isLowFlowLowGradient,
  mitralRegurgitationSeverity,
  pulmonicRegurgitationSeverity,
  regurgitationLabel,
  tricuspidRegurgitationSeverity,
  type AorticValveMeasurements,
} from "../calculations/valves.js";
import type { EchoRecord } from "../snapshot/schemas.js";
import type { AorticSegmentMetrics, EchoMetrics } from "../shared/types.js";

/**
 * Aortic valve measurements with the AVA indexed to BSA (2 decimals).
 * Shared by the metrics aggregator, the composers and the guideline engine
 * so all of them grade the same numbers.
 */
export function aorticValveMeasurements(echo: EchoRecord): AorticValveMeasurements {
  return {
    vmax: echo.ak_vmax,
    meanGradient: echo.ak_mean,
    ava: echo.ava,
    avaIndex: indexToBsa(echo.ava, echo.patient.bsa, 2),
  };
}

/** Measured aortic segments in fixed AoA → AscAo order. */
export function assessAorticSegments(echo: EchoRecord): AorticSegmentMetrics[] {
  const { patient } = echo;
  const body: BodyDimensions = {
    sex: patient.sex,
    age: patient.age,
    lengthCm: patient.length,
    weightKg: patient.weight,
  };
  const out: AorticSegmentMetrics[] = [];
  for (const segment of AORTIC_SEGMENTS) {
    const measured = echo[segment.key];
    if (measured === undefined) continue;
    out.push(assessAorticSegment(segment, measured, patient.bsa, body));
  }
  return out;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Every automatic echo label and index the report falls back to when the
 * clinician left a field open.
 */
export function computeEchoMetrics(echo: EchoRecord): EchoMetrics {
  const { sex, bsa } = echo.patient;
  const hasBsa = bsa !== undefined && bsa > 0;
  const lines: string[] = [];

  // ── LV structure ──
  let lvMassG: number | undefined;
  let rwt: number | undefined;
  let lvMassIndex: number | undefined;
  let lvMassSeverity: EchoMetrics["lvMassSeverity"];
  if (echo.ivsd !== undefined && echo.lvidd !== undefined && echo.lvpw !== undefined) {
    lvMassG = computeLvMassG(echo.ivsd, echo.lvidd, echo.lvpw);
    rwt = computeRwt(echo.lvpw, echo.lvidd);
    if (hasBsa) {
      const mi = lvMassIndexSeverity(lvMassG, bsa, sex);
      lvMassIndex = mi.massIndex;
      lvMassSeverity = mi.severity;
    }
  }
  const ivsdClass = echo.ivsd !== undefined ? classifyIvsd(echo.ivsd, sex) : undefined;

  let lvHypertrophyAuto = "Normotroof";
  if (lvMassSeverity !== undefined && rwt !== undefined) {
    lvHypertrophyAuto = determineLvGeometry(lvMassSeverity, rwt);
  } else if (ivsdClass !== undefined) {
    lvHypertrophyAuto = ivsdClass;
  }

  if (lvMassG !== undefined) lines.push(`LV massa: ${Math.round(lvMassG)} g`);
  if (lvMassIndex !== undefined) lines.push(`LVMI: ${lvMassIndex} g/m² (${lvMassSeverity})`);
  if (rwt !== undefined) lines.push(`RWT: ${rwt}`);
  if (lvMassG !== undefined || ivsdClass !== undefined) lines.push(`LV hypertrofie: ${lvHypertrophyAuto}`);

  // ── LV dimensions and function ──
  const lvDilationAuto = echo.lvidd !== undefined ? classifyLvidd(echo.lvidd, sex, bsa) : "niet gedilateerd";
  const lviddIndex = indexToBsa(echo.lvidd, bsa, 1);
  if (lviddIndex !== undefined) {
    lines.push(`LVIDd index: ${lviddIndex} mm/m² — ${capitalize(lvDilationAuto)}`);
  }

  const lvesdi = indexToBsa(echo.lvids, bsa, 1);
  let lvidsSeverity: EchoMetrics["lvidsSeverity"];
  let lvidsLabel: string | undefined;
  if (echo.lvids !== undefined) {
    lvidsSeverity = classifyLvids(echo.lvids, indexToBsa(echo.lvids, bsa, 2), sex);
    lvidsLabel = LVIDS_LABELS[lvidsSeverity];
    lines.push(
      lvesdi !== undefined
        ? `LVIDs index: ${lvesdi} mm/m² — ${lvidsLabel}`
        : `LVIDs: ${echo.lvids} mm — ${lvidsLabel}`
    );
  }

  const teichholzEf = teichholzEjectionFraction(echo.lvidd, echo.lvids);
  if (teichholzEf !== undefined) lines.push(`Teichholz EF (LVIDd/LVIDs): ~${teichholzEf}%`);

  const lvefClass = echo.lvef !== undefined ? classifyLvef(echo.lvef, sex) : undefined;
  const systolicFunctionAuto = systolicFunctionPhrase(lvefClass);

  // ── Atria and diastole ──
  const lavi = echo.lavi ?? indexToFlooredBsa(echo.la_volume, bsa, 0.01, 1);
  const laDilationAuto = lavi !== undefined ? classifyLavi(lavi) : undefined;
  if (lavi !== undefined && laDilationAuto !== undefined) lines.push(`LAVI: ${lavi} mL/m² — ${laDilationAuto}`);

  const diastolicFunctionAuto = suggestDiastolicFunction({
    ea: echo.ea,
    ee: echo.ee,
    lavi,
    pasp: echo.pasp_raw,
  });

  const ravi = indexToFlooredBsa(echo.ra_volume, bsa, 0.01, 1);
  const raDilationAuto = suggestRaDilation(ravi, sex);
  if (ravi !== undefined) lines.push(`RAVI: ${ravi} mL/m² — ${raDilationAuto}`);

  // ── Right ventricle ──
  const rvHypertrophyAuto = suggestRvHypertrophy(echo.rvfwd);
  const rvDilationAuto = suggestRvDilation(echo.rvbd, echo.rvmd);
  const rvFunctionAuto = echo.tapse !== undefined ? classifyTapse(echo.tapse) : RV_FUNCTION_GOOD;

  // ── Aorta ──
  const aorticSegments = assessAorticSegments(echo);
  for (const seg of aorticSegments) {
    if (seg.predictedRange) {
      lines.push(
        `${seg.label} predicted range (lower–higher): ${seg.predictedRange.lowerMm}–${seg.predictedRange.upperMm} mm`
      );
    }
    if (seg.indexedMmPerM2 !== undefined) {
      const status = seg.dilated ? "Gedilateerd" : "Niet gedilateerd";
      lines.push(`${seg.label}: ${seg.measuredMm} mm — Indexed: ${seg.indexedMmPerM2.toFixed(1)} mm/m² — ${status}`);
    } else {
      lines.push(`${seg.label}: ${seg.measuredMm} mm`);
    }
  }

  // ── Aortic valve ──
  const valve = aorticValveMeasurements(echo);
  const svi = indexToBsa(echo.sv, bsa, 1);
  const aorticStenosisAuto = gradeAorticStenosis(valve);
  const lowFlowLowGradient = isLowFlowLowGradient(valve, svi);
  const akParts: string[] = [];
  if (valve.vmax !== undefined) akParts.push(`Vmax ${valve.vmax.toFixed(2)} m/s`);
  if (valve.meanGradient !== undefined) akParts.push(`MeanG ${Math.round(valve.meanGradient)} mmHg`);
  if (valve.ava !== undefined) {
    const idx = valve.avaIndex !== undefined ? `, AVA index ${valve.avaIndex.toFixed(2)} cm²/m²` : "";
    akParts.push(`AVA ${valve.ava.toFixed(2)} cm²${idx}`);
  }
  if (svi !== undefined) {
    akParts.push(`SVi ${svi.toFixed(1)} mL/m²`);
    if (svi <= 35) akParts.push("(laag slagvolume)");
  }
  if (akParts.length > 0) lines.push(`AK: ${aorticStenosisAuto} (${akParts.join(", ")})`);

  // ── Regurgitant valves ──
  const mitralScore = mitralRegurgitationSeverity(echo.mk_eroa, echo.mk_regvol, echo.mk_rf);
  const tricuspidScore = tricuspidRegurgitationSeverity({
    eroa: echo.tk_eroa,
    regVol: echo.tk_regvol,
    rf: echo.tk_rf,
    vcw: echo.tk_vcw,
  });
  const pulmonicScore = pulmonicRegurgitationSeverity({
    eroa: echo.pk_eroa,
    regVol: echo.pk_regvol,
    rf: echo.pk_rf,
    dtMs: echo.pk_dt,
    phtMs: echo.pk_pht,
    prIndex: echo.pk_pr_index,
  });
  const mitralRegurgitationAuto = regurgitationLabel(mitralScore, "mitralis");
  const tricuspidRegurgitationAuto = regurgitationLabel(tricuspidScore, "tricuspidalis");
  const pulmonicRegurgitationAuto = regurgitationLabel(pulmonicScore, "pulmonalis");
  if (mitralScore > 0) lines.push(`MK: ${mitralRegurgitationAuto}`);
  if (tricuspidScore > 0) lines.push(`TK: ${tricuspidRegurgitationAuto}`);
  if (pulmonicScore > 0) lines.push(`PK: ${pulmonicRegurgitationAuto}`);

  const pasp = paspText(echo.pasp_raw, echo.cvd ?? DEFAULT_CVD);
  if (echo.pasp_raw !== undefined) lines.push(pasp);

  return {
    lvMassG,
    rwt,
    lvMassIndex,
    lvMassSeverity,
    ivsdClass,
    lvHypertrophyAuto,
    lvDilationAuto,
    lvefClass,
    systolicFunctionAuto,
    lvesdi,
    lvidsSeverity,
    lvidsLabel,
    teichholzEf,
    lavi,
    laDilationAuto,
    diastolicFunctionAuto,
    rvHypertrophyAuto,
    rvDilationAuto,
    rvFunctionAuto,
    ravi,
    raDilationAuto,
    aorticSegments,
    aortaDilated: aorticSegments.some((s) => s.dilated),
    avaIndex: valve.avaIndex,
    svi,
    aorticStenosisAuto,
    lowFlowLowGradient,
    mitralScore,
    mitralRegurgitationAuto,
    tricuspidScore,
    tricuspidRegurgitationAuto,
    pulmonicScore,
    pulmonicRegurgitationAuto,
    paspText: pasp,
    summaryLines: lines,
  };
}
