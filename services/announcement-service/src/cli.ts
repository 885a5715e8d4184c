#!/usr/bin/env node
import { z } from "zod";
import { logger } from "./logger";
import { dedupeByNewsId } from "./modules/dedupe";
import {
    FetchAnnouncements,
    FetchAnnouncementsOptions,
    fetchAnnouncements,
} from "./modules/fetchAnnouncements";
import { DEFAULT_TIMEZONE, todayInZone } from "./utils/date";

/*
 Usage:
   cli --from 2025-09-28 --to 2025-10-04 --verbose --probe
   cli --search tata
*/

export const CLI_ROW_LIMIT = 50;
const DEFAULT_WINDOW_DAYS = 6;

const cliSchema = z.object({
    fromDate: z.string(),
    toDate: z.string(),
    segment: z.string(),
    submissionType: z.string(),
    category: z.string(),
    subcategory: z.string(),
    search: z.string(),
    maxPages: z.coerce.number().int().positive().optional(),
    verbose: z.boolean(),
    probe: z.boolean(),
});

function argValue(argv: string[], flag: string): string | undefined {
    const index = argv.indexOf(flag);
    if (index === -1 || index + 1 >= argv.length) return undefined;
    return argv[index + 1];
}

/**
 * Reads CLI flags. Dates default to the last week in `zone`.
 */
export function parseCliArgs(
    argv: string[],
    zone: string = DEFAULT_TIMEZONE
): FetchAnnouncementsOptions {
    const today = todayInZone(zone);

    return cliSchema.parse({
        fromDate:
            argValue(argv, "--from") ??
            today.minus({ days: DEFAULT_WINDOW_DAYS }).toFormat("yyyy-MM-dd"),
        toDate: argValue(argv, "--to") ?? today.toFormat("yyyy-MM-dd"),
        segment: argValue(argv, "--segment") ?? "C",
        submissionType: argValue(argv, "--subm") ?? "0",
        category: argValue(argv, "--cat") ?? "",
        subcategory: argValue(argv, "--subcat") ?? "",
        search: argValue(argv, "--search") ?? "",
        maxPages: argValue(argv, "--max-pages"),
        verbose: argv.includes("--verbose"),
        probe: argv.includes("--probe"),
    });
}

export async function runCli(
    argv: string[],
    fetch: FetchAnnouncements = (options) => fetchAnnouncements(options),
    write: (text: string) => void = (text) => process.stdout.write(text)
): Promise<number> {
    try {
        const rows = dedupeByNewsId(await fetch(parseCliArgs(argv)));
        const summary = { count: rows.length, rows: rows.slice(0, CLI_ROW_LIMIT) };
        write(`${JSON.stringify(summary, null, 2)}\n`);
        return 0;
    } catch (err) {
        logger.error({ err }, "Announcements fetch failed");
        return 1;
    }
}

if (require.main === module) {
    runCli(process.argv.slice(2)).then(
        (code) => {
            process.exitCode = code;
        },
        (err: unknown) => {
            logger.fatal({ err }, "Unexpected CLI failure");
            process.exitCode = 1;
        }
    );
}
