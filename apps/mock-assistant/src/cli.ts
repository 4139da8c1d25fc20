/**
 * @fileoverview Command-line argument handling
 *
 * @module cli
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { isTaskKind, type Logger, type TaskKind, type Turn } from "@mockpilot/engine";

export const USAGE = `Usage: mock-assistant "<prompt>" [options]

Options:
  --namespace <ns>     Workspace to operate in (default: default)
  --kind <TASK_KIND>   Skip classification and run this task kind
  --history <file>     JSON file holding earlier turns: [{ "role", "content" }]
  --confirm            Carry out a deletion the request prepares
  --json               Print the full response as JSON
  --verbose            Include debug logs`;

/**
 * Parsed command line
 */
export interface CliOptions {
    prompt: string;
    namespace: string;
    kind?: TaskKind;
    historyFile?: string;
    confirm: boolean;
    json: boolean;
    verbose: boolean;
}

const VALUE_FLAGS = new Set(["--namespace", "--kind", "--history"]);

/**
 * Parse arguments after the script name.
 *
 * @throws Error with a message suitable for the terminal
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
    const values = new Map<string, string>();
    const flags = new Set<string>();
    const words: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (VALUE_FLAGS.has(arg)) {
            const value = args[i + 1];
            if (value === undefined || value.startsWith("--")) {
                throw new Error(`${arg} needs a value`);
            }
            values.set(arg, value);
            i++;
        }
        else if (arg.startsWith("--")) {
            flags.add(arg);
        }
        else {
            words.push(arg);
        }
    }

    const prompt = words.join(" ").trim();
    if (!prompt) {
        throw new Error("A prompt is required");
    }

    const kind = values.get("--kind")?.toUpperCase();
    if (kind !== undefined && !isTaskKind(kind)) {
        throw new Error(`Unknown task kind: ${kind}`);
    }

    return {
        prompt,
        namespace  : values.get("--namespace") ?? "default",
        kind,
        historyFile: values.get("--history"),
        confirm    : flags.has("--confirm"),
        json       : flags.has("--json"),
        verbose    : flags.has("--verbose"),
    };
}

const HistorySchema = z.array(z.object({
    role   : z.enum(["user", "assistant"]),
    content: z.string(),
}));

/**
 * Read conversation turns from a JSON file.
 *
 * @throws Error if the file is not a list of turns
 */
export function loadHistory(filePath: string): Turn[] {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    const result = HistorySchema.safeParse(parsed);
    if (!result.success) {
        throw new Error(`Invalid history file ${filePath}: expected [{ role, content }, ...]`);
    }
    return result.data;
}

/**
 * Logger writing to stderr so stdout carries only the answer.
 */
export function createCliLogger(verbose: boolean): Logger {
    return {
        debug: (msg, data) => {
            if (verbose) {
                console.error(`[DEBUG] ${msg}`, data ?? "");
            }
        },
        info : (msg, data) => console.error(`[INFO] ${msg}`, data ?? ""),
        warn : (msg, data) => console.error(`[WARN] ${msg}`, data ?? ""),
        error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
    };
}
