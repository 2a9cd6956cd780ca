import archiver from "archiver";
import { Writable } from "stream";
import type { StudySnapshot } from "../snapshot/schemas.js";
import { snapshotToDict } from "../snapshot/snapshot.js";
import type { DerivationRecorder } from "../trace/derivation.js";
import { exportJSONL, generateAuditSummaryMd } from "../trace/exporters.js";

export interface BundleFile {
  name: string;
  content: Buffer | string;
}

/**
 * Create a zip bundle from files.
 * Returns the zip as a Buffer.
 */
export async function createZipBundle(files: readonly BundleFile[]): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const writableStream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });

    const archive = archiver("zip", { zlib: { level: 9 } });

    writableStream.on("finish", () => {
      resolve(Buffer.concat(chunks));
    });

    archive.on("error", (err) => reject(err));
    archive.pipe(writableStream);

    for (const file of files) {
      archive.append(typeof file.content === "string" ? Buffer.from(file.content, "utf-8") : file.content, {
        name: file.name,
      });
    }

    archive.finalize().catch(reject);
  });
}

export interface ArtifactOptions {
  recorder?: DerivationRecorder;
  /** Extra files, e.g. rendered .docx documents. */
  extra?: readonly BundleFile[];
}

/**
 * Plain artifacts of a report run: one `{key}.txt` per report text, the
 * snapshot JSON and, when a recorder is given, the trace JSONL and audit
 * summary.
 */
export function buildReportArtifacts(snapshot: StudySnapshot, options: ArtifactOptions = {}): BundleFile[] {
  const files: BundleFile[] = Object.entries(snapshot.report_texts)
    .filter(([, text]) => text.trim() !== "")
    .map(([key, text]) => ({ name: `${key}.txt`, content: `${text}\n` }));

  files.push({ name: "snapshot.json", content: `${JSON.stringify(snapshotToDict(snapshot), null, 2)}\n` });

  if (options.recorder) {
    const chain = options.recorder.getChain();
    files.push({ name: "trace.jsonl", content: exportJSONL(chain) });
    files.push({ name: "audit_summary.md", content: generateAuditSummaryMd(chain, options.recorder.runId) });
  }

  files.push(...(options.extra ?? []));
  return files;
}
