import { Document, HeadingLevel, Packer, Paragraph, TextRun } from "docx";
import { LETTER_UNDERLINE } from "../reports/letter.js";
import { REPORT_GENERATORS, STUDY_ORDER } from "../reports/generators/index.js";
import type { StudySnapshot } from "../snapshot/schemas.js";

const FONT = "Arial";

function heading(text: string, level: (typeof HeadingLevel)[keyof typeof HeadingLevel]): Paragraph {
  const size = level === HeadingLevel.HEADING_1 ? 32 : 26;
  return new Paragraph({
    heading: level,
    children: [new TextRun({ text, bold: true, size, font: FONT })],
  });
}

function body(text: string): Paragraph {
  return new Paragraph({ children: [new TextRun({ text, size: 20, font: FONT })] });
}

function bullet(text: string): Paragraph {
  return new Paragraph({ bullet: { level: 0 }, children: [new TextRun({ text, size: 20, font: FONT })] });
}

const spacer = () => new Paragraph({ children: [] });

async function pack(children: Paragraph[]): Promise<Buffer> {
  const doc = new Document({ sections: [{ children }] });
  return Buffer.from(await Packer.toBuffer(doc));
}

/**
 * Letter lines as paragraphs. A line followed by the underline becomes a
 * level-2 heading and the underline itself is dropped.
 */
export function letterParagraphs(letter: string): Paragraph[] {
  const lines = letter.replace(/\n$/, "").split("\n");
  const out: Paragraph[] = [];
  lines.forEach((line, i) => {
    if (line === LETTER_UNDERLINE) return;
    if (lines[i + 1] === LETTER_UNDERLINE) out.push(heading(line, HeadingLevel.HEADING_2));
    else if (line.trim() === "") out.push(spacer());
    else out.push(body(line));
  });
  return out;
}

/** Render a composed consultation letter as a .docx buffer. */
export async function renderLetterDocx(letter: string, title = "Consultatieverslag cardiologie"): Promise<Buffer> {
  return pack([heading(title, HeadingLevel.HEADING_1), spacer(), ...letterParagraphs(letter)]);
}

/**
 * Render every full report on the snapshot, in letter order, followed by
 * the guideline recommendations when there are any.
 */
export async function renderReportsDocx(snapshot: StudySnapshot, recommendations: readonly string[] = []): Promise<Buffer> {
  const children: Paragraph[] = [heading("Verslagen", HeadingLevel.HEADING_1), spacer()];

  for (const kind of STUDY_ORDER) {
    const generator = REPORT_GENERATORS[kind];
    const text = snapshot.report_texts[generator.fullKey];
    if (!text?.trim()) continue;
    children.push(heading(generator.title, HeadingLevel.HEADING_2));
    for (const line of text.split("\n")) children.push(line.trim() ? body(line) : spacer());
    children.push(spacer());
  }

  if (recommendations.length > 0) {
    children.push(heading("Aanbevelingen", HeadingLevel.HEADING_2));
    for (const rec of recommendations) children.push(bullet(rec));
  }

  return pack(children);
}
