import { describe, it, expect } from "vitest";
import {
  gradeAorticStenosis,
  isLowFlowLowGradient,
  isSevereAorticStenosis,
  mitralRegurgitationSeverity,
  pulmonicRegurgitationSeverity,
  regurgitationLabel,
  tricuspidRegurgitationSeverity,
} from "../src/calculations/valves.js";
import { AORTIC_SEGMENTS, aorticSegment, assessAorticSegment, predictAorticRange } from "../src/calculations/aorta.js";

describe("Regurgitation severity", () => {
  it("takes the worst mitral criterion", () => {
    expect(mitralRegurgitationSeverity(0.1, 65, 10)).toBe(3);
    expect(mitralRegurgitationSeverity(0.25)).toBe(2);
    expect(mitralRegurgitationSeverity(undefined, undefined, 20)).toBe(1);
    expect(mitralRegurgitationSeverity()).toBe(0);
  });

  it("grades tricuspid with its own volume cutoff and vena contracta", () => {
    expect(tricuspidRegurgitationSeverity({ vcw: 0.75 })).toBe(3);
    expect(tricuspidRegurgitationSeverity({ regVol: 45 })).toBe(3);
    expect(tricuspidRegurgitationSeverity({ regVol: 40 })).toBe(2);
    expect(tricuspidRegurgitationSeverity({ eroa: 0.1, rf: 20 })).toBe(1);
    expect(tricuspidRegurgitationSeverity({})).toBe(0);
  });

  it("grades pulmonic timing criteria where shorter is worse", () => {
    expect(pulmonicRegurgitationSeverity({ dtMs: 250 })).toBe(3);
    expect(pulmonicRegurgitationSeverity({ phtMs: 150 })).toBe(2);
    expect(pulmonicRegurgitationSeverity({ prIndex: 0.95 })).toBe(1);
    expect(pulmonicRegurgitationSeverity({ prIndex: 0.95, rf: 55 })).toBe(3);
    expect(pulmonicRegurgitationSeverity({})).toBe(0);
  });

  it("labels scores per valve", () => {
    expect(regurgitationLabel(0, "mitralis")).toBe("Geen regurgitatie");
    expect(regurgitationLabel(1, "mitralis")).toBe("Milde mitralis regurgitatie");
    expect(regurgitationLabel(2, "tricuspidalis")).toBe("Matige tricuspidalis regurgitatie");
    expect(regurgitationLabel(3, "pulmonalis")).toBe("Ernstige pulmonalis regurgitatie");
  });
});

describe("Aortic stenosis grading", () => {
  it("grades from any single criterion", () => {
    expect(gradeAorticStenosis({})).toBe("Geen stenose");
    expect(gradeAorticStenosis({ vmax: 4.2 })).toBe("Ernstige stenose");
    expect(gradeAorticStenosis({ vmax: 5.5 })).toBe("Zeer ernstige stenose");
    expect(gradeAorticStenosis({ meanGradient: 25 })).toBe("Matige stenose");
    expect(gradeAorticStenosis({ ava: 0.9 })).toBe("Ernstige stenose");
    expect(gradeAorticStenosis({ avaIndex: 0.7 })).toBe("Matige stenose");
    expect(gradeAorticStenosis({ vmax: 2.6, ava: 1.8 })).toBe("Milde stenose");
  });

  it("caps valve area at the severe tier", () => {
    expect(gradeAorticStenosis({ ava: 0.5, avaIndex: 0.3 })).toBe("Ernstige stenose");
  });

  it("accepts a clinician label naming severe stenosis", () => {
    expect(isSevereAorticStenosis({}, "Ernstige stenose")).toBe(true);
    expect(isSevereAorticStenosis({ vmax: 3.5 })).toBe(false);
    expect(isSevereAorticStenosis({ meanGradient: 65 })).toBe(true);
  });

  it("detects low-flow low-gradient only with a known SVi", () => {
    expect(isLowFlowLowGradient({ ava: 0.8, meanGradient: 30 }, 30)).toBe(true);
    expect(isLowFlowLowGradient({ ava: 0.8, meanGradient: 30 }, 40)).toBe(false);
    expect(isLowFlowLowGradient({ ava: 0.8, meanGradient: 30 }, undefined)).toBe(false);
    expect(isLowFlowLowGradient({ ava: 1.2, meanGradient: 30 }, 30)).toBe(false);
  });
});

describe("Aortic segments", () => {
  const body = { sex: "Man" as const, age: 50, lengthCm: 180, weightKg: 80 };

  it("lists the four segments in anatomical order", () => {
    expect(AORTIC_SEGMENTS.map((s) => s.label)).toEqual(["AoA", "AoSV", "AoSTJ", "AscAo"]);
    expect(aorticSegment("ascao").name).toBe("Aorta ascendens (AscAo)");
  });

  it("predicts a normal range from age, sex, length and weight", () => {
    expect(predictAorticRange(aorticSegment("aoa"), body)).toEqual({ lowerMm: 15.69, upperMm: 26.63 });
    expect(predictAorticRange(aorticSegment("aoa"), { sex: "Man", age: 50 })).toBeUndefined();
  });

  it("flags dilation against the indexed cutoff", () => {
    const result = assessAorticSegment(aorticSegment("aoa"), 40, 1.9, body);
    expect(result.indexedMmPerM2).toBe(21.1);
    expect(result.dilated).toBe(true);
    expect(result.predictedRange).toEqual({ lowerMm: 15.69, upperMm: 26.63 });
  });

  it("never flags without a BSA", () => {
    const result = assessAorticSegment(aorticSegment("aoa"), 40, undefined, { sex: "Vrouw" });
    expect(result).toEqual({ key: "aoa", label: "AoA", measuredMm: 40, dilated: false });
  });
});
