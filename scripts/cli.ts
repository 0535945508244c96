import { ConfigError, type DocumentType } from "@policyqa/core";

/** Value following `--name`, or null when the option is absent. */
export function readOption(name: string, argv: readonly string[] = process.argv): string | null {
  const at = argv.indexOf(`--${name}`);
  return at === -1 ? null : (argv[at + 1] ?? null);
}

export function hasSwitch(name: string, argv: readonly string[] = process.argv): boolean {
  return argv.includes(`--${name}`);
}

export function readPositiveInt(name: string, argv: readonly string[] = process.argv): number | undefined {
  const raw = readOption(name, argv);
  if (raw === null) return undefined;

  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError([`--${name}: expected a positive integer, got "${raw}"`]);
  }
  return n;
}

export function readDocumentType(name: string, argv: readonly string[] = process.argv): DocumentType | undefined {
  const raw = readOption(name, argv);
  if (raw === null) return undefined;
  if (raw === "pdf" || raw === "docx") return raw;
  throw new ConfigError([`--${name}: expected pdf or docx, got "${raw}"`]);
}
