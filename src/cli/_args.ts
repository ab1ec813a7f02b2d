import { parsePositiveInt } from "../config/analysisConfig";

export function getArg(flag: string, argv: readonly string[] = process.argv): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

export function getPositionalArgs(argv: readonly string[] = process.argv): string[] {
  const args = argv.slice(2);
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      i += 1;
      continue;
    }
    positionals.push(arg);
  }
  return positionals;
}

export function getIntArg(flag: string, fallback: number, argv: readonly string[] = process.argv): number {
  const raw = getArg(flag, argv);
  if (raw === undefined) return fallback;
  return parsePositiveInt(raw, flag);
}

export type DataSource = "csv" | "supabase";

export function getSourceArg(argv: readonly string[] = process.argv): DataSource {
  const raw = getArg("--source", argv);
  if (raw === undefined || raw === "csv") return "csv";
  if (raw === "supabase") return "supabase";
  throw new Error(`Invalid --source: ${raw} (expected csv or supabase)`);
}
