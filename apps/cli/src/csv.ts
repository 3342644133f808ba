import Papa from "papaparse";
import type { Entry } from "@passgauge/core";

export type Row = {
  name: string;
  url: string;
  username: string;
  password: string;
  note: string;
};

export type ExportEntry = Entry & { url?: string };

export type ParseResult =
  | { ok: true; rows: Row[]; entries: ExportEntry[] }
  | { ok: false; error: string };

const REQUIRED = ["name", "url", "username", "password", "note"] as const;

/** Parses a password-manager CSV export (name,url,username,password,note). */
export function parseCSV(text: string): ParseResult {
  const parsed = Papa.parse<Partial<Row>>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim().toLowerCase(),
  });

  if (parsed.errors.length) {
    const first = parsed.errors[0];
    const where = first.row === undefined ? "" : ` (row ${first.row + 1})`;
    return { ok: false, error: `${first.message}${where}` };
  }

  const fields = parsed.meta.fields ?? [];
  const missing = REQUIRED.filter((k) => !fields.includes(k));
  if (missing.length) {
    return {
      ok: false,
      error: `Missing required columns: ${missing.join(", ")}. Found: ${fields.join(", ")}`,
    };
  }

  const rows: Row[] = parsed.data.map((r) => ({
    name: (r.name ?? "").trim(),
    url: (r.url ?? "").trim(),
    username: (r.username ?? "").trim(),
    password: r.password ?? "",
    note: (r.note ?? "").trim(),
  }));

  const entries: ExportEntry[] = rows
    .map((r) => ({
      site: r.name || r.url || "(unknown)",
      username: r.username,
      password: r.password,
      url: r.url || undefined,
    }))
    .filter((e) => e.username || e.password);

  return { ok: true, rows, entries };
}
