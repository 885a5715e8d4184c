import express, { NextFunction, Request, Response } from "express";
import { Env } from "./config/env";
import { DEFAULT_UPSTREAM, withRequestTimeout } from "./constants/upstream";
import { logger } from "./logger";
import { runAnnouncementQuery } from "./modules/announcementQuery";
import { FetchAnnouncements, fetchAnnouncements } from "./modules/fetchAnnouncements";
import { ProbeReport, probeConnectivity } from "./modules/probeConnectivity";
import { announcementQuerySchema } from "./schemas/announcementQuery.schema";
import { InvalidDateError, todaySiteDate } from "./utils/date";

export interface AppDeps {
    env: Env;
    fetch?: FetchAnnouncements;
    probe?: () => Promise<ProbeReport>;
}

function errorTrace(err: unknown): string {
    if (err instanceof Error) return err.stack ?? err.message;
    return String(err);
}

export function createApp({ env, fetch, probe }: AppDeps): express.Application {
    const upstream = withRequestTimeout(DEFAULT_UPSTREAM, env.REQUEST_TIMEOUT_MS);
    const fetchRows: FetchAnnouncements =
        fetch ?? ((options) => fetchAnnouncements(options, { upstream }));
    const runProbe = probe ?? (() => probeConnectivity(upstream));

    const querySchema = announcementQuerySchema(env.MAX_PAGES_LIMIT);
    const basePath = env.BASE_PATH;
    const usage = `GET ${basePath}/announcements?search=...&from_date=YYYY-MM-DD&to_date=YYYY-MM-DD`;

    const app = express();
    app.disable("x-powered-by");

    // Lightweight CORS, read-only API
    app.use((req: Request, res: Response, next: NextFunction) => {
        res.header("Access-Control-Allow-Origin", "*");
        res.header("Access-Control-Allow-Headers", "*");
        res.header("Access-Control-Allow-Methods", "GET,OPTIONS");
        if (req.method === "OPTIONS") {
            res.sendStatus(204);
            return;
        }
        logger.debug({ method: req.method, path: req.path }, "HTTP request");
        next();
    });

    app.get("/", (_req, res) => {
        res.json({ ok: true, usage });
    });

    const router = express.Router();

    router.get("/healthz", (_req, res) => {
        res.json({
            ok: true,
            today: todaySiteDate(env.SERVICE_TIMEZONE),
            timezone: env.SERVICE_TIMEZONE,
        });
    });

    router.get("/probe", async (_req, res) => {
        try {
            res.json(await runProbe());
        } catch (err) {
            logger.error({ err }, "Probe request failed");
            res.status(500).json({ error: "Server crash", trace: errorTrace(err) });
        }
    });

    router.get("/announcements", async (req, res) => {
        const parsed = querySchema.safeParse(req.query);
        if (!parsed.success) {
            res.status(422).json({
                error: "Invalid query parameters",
                issues: parsed.error.issues,
            });
            return;
        }

        try {
            const body = await runAnnouncementQuery(parsed.data, {
                mode: env.FACADE_MODE,
                defaultMaxPages: env.DEFAULT_MAX_PAGES,
                delayMs: env.PAGE_DELAY_MS,
                pageSize: env.PAGE_SIZE,
                timezone: env.SERVICE_TIMEZONE,
                fetch: fetchRows,
            });
            res.json(body);
        } catch (err) {
            if (err instanceof InvalidDateError) {
                res.status(400).json({ error: err.message });
                return;
            }
            logger.error({ err }, "Announcements request failed");
            res.status(500).json({ error: "Server crash", trace: errorTrace(err) });
        }
    });

    app.use(basePath || "/", router);

    // Unknown paths answer with what was received, to debug proxy routing
    app.use((req: Request, res: Response) => {
        res.status(404).json({
            debug: "catch-all",
            received_path: req.path,
            query: req.query,
            hint: `Use / for health and ${basePath}/announcements for data.`,
        });
    });

    return app;
}
