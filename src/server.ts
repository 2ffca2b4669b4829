// HTTP endpoints: Discord interactions, command registration and a manual medal trigger.

import { Server } from "node:http";
import express, { Request, Response } from "express";
import { InteractionResponseType, InteractionType, verifyKey } from "discord-interactions";
import { z } from "zod";
import { BackfillCommand } from "./commands/backfill";
import { Command, CommandContext, interactionSchema } from "./commands/command";
import { HelpCommand } from "./commands/help";
import { MedalsCommand } from "./commands/medals";
import { MyStepsCommand } from "./commands/mySteps";
import { IsoDate, parseIsoDate, yesterdayIn } from "./step-tracker/dates";
import { discordRequest } from "./step-tracker/discordApi";
import { RankedEntry } from "./step-tracker/rankMedals";

// List of all available slash commands
export const commands: Command[] = [
    new MedalsCommand(),
    new MyStepsCommand(),
    new BackfillCommand(),
    new HelpCommand(),
    // Add new Command instances here
];

const adminBodySchema = z.object({
    password: z.string().optional(),
    date: z.string().optional(),
}).passthrough();

export interface ServerDependencies {
    commandContext: CommandContext;
    assignMedals: (date: IsoDate) => Promise<RankedEntry[]>;
}

/**
 * Builds the Express app serving the bot's HTTP endpoints.
 */
export function createServer(deps: ServerDependencies): express.Express {
    const app = express();
    const { config } = deps.commandContext;

    /**
     * Discord interactions (slash commands, pings).
     * Verifies the request signature against the raw body before routing.
     */
    app.post("/interactions", express.raw({ type: "*/*" }), async (req: Request, res: Response) => {
        const signature = req.get("X-Signature-Ed25519");
        const timestamp = req.get("X-Signature-Timestamp");
        if (!signature || !timestamp) {
            res.status(401).end("Missing signature or timestamp");
            return;
        }
        if (!Buffer.isBuffer(req.body)) {
            res.status(400).end("Missing body");
            return;
        }
        const rawBody = req.body;

        let isValidRequest = false;
        try {
            isValidRequest = await verifyKey(rawBody, signature, timestamp, config.discord.publicKey);
        } catch (e) {
            console.error("[Steps] Error verifying key:", e);
        }
        if (!isValidRequest) {
            res.status(401).end("Bad request signature");
            return;
        }

        let body: unknown;
        try {
            body = JSON.parse(rawBody.toString("utf8"));
        } catch {
            res.status(400).send({ error: "Invalid JSON" });
            return;
        }
        const parsed = interactionSchema.safeParse(body);
        if (!parsed.success) {
            res.status(400).send({ error: "Invalid interaction payload" });
            return;
        }
        const interaction = parsed.data;

        // Handle Discord PING (for verification)
        if (interaction.type === InteractionType.PING) {
            console.log("[Steps] Handling Ping request");
            res.send({ type: InteractionResponseType.PONG });
            return;
        }

        if (interaction.type === InteractionType.APPLICATION_COMMAND) {
            const commandName = interaction.data?.name.toLowerCase();
            const command = commands.find(cmd => cmd.data.name === commandName);
            if (!command) {
                console.warn(`[Steps] Unknown command: ${commandName}`);
                res.status(400).send({ error: "Unknown command" });
                return;
            }
            try {
                await command.execute(interaction, res, deps.commandContext);
            } catch (err) {
                console.error(`[Steps] Error executing command ${commandName}:`, err);
                if (!res.headersSent) {
                    res.status(500).send({ error: "Command execution error" });
                }
            }
            return;
        }

        console.error("[Steps] Unknown Interaction type");
        res.status(400).send({ error: "Unknown Interaction type" });
    });

    /**
     * Registers all slash commands with Discord.
     * Only needs to be called when commands are added or updated.
     * Requires the admin password (via query, header, or body).
     */
    app.post("/register-commands", express.json(), async (req: Request, res: Response) => {
        if (!isAdmin(req, config.adminPassword)) {
            res.status(403).send("Forbidden: Invalid password.");
            return;
        }
        try {
            console.log("[Steps] Registering commands:", commands.map(cmd => cmd.data.name));
            const response = await discordRequest(
                `/applications/${config.discord.applicationId}/commands`,
                config.discord.botToken,
                { method: "PUT", body: commands.map(cmd => cmd.data) }
            );
            if (response.ok) {
                console.log("[Steps] Successfully registered commands");
                res.status(200).send("Commands registered successfully!");
            } else {
                const errorText = await response.text();
                console.error("[Steps] Error registering commands:", errorText);
                res.status(500).send(`Error registering commands: ${errorText}`);
            }
        } catch (error) {
            console.error("[Steps] Error sending request to Discord API:", error);
            res.status(500).send("An unexpected error occurred.");
        }
    });

    /**
     * Runs medal assignment on demand (defaults to yesterday).
     * Requires the admin password.
     */
    app.post("/assign-medals", express.json(), async (req: Request, res: Response) => {
        if (!isAdmin(req, config.adminPassword)) {
            res.status(403).send("Forbidden: Invalid password.");
            return;
        }
        const body = adminBodySchema.safeParse(req.body ?? {});
        const requested = typeof req.query.date === "string" ? req.query.date : body.success ? body.data.date : undefined;
        const date = requested ? parseIsoDate(requested) : yesterdayIn(config.timeZone);
        if (!date) {
            res.status(400).send({ error: "Invalid date, expected YYYY-MM-DD" });
            return;
        }
        try {
            const ranked = await deps.assignMedals(date);
            res.status(200).send({
                date,
                awarded: ranked.map(({ record, medal }) => ({ nickname: record.nickname, steps: record.steps, medal })),
            });
        } catch (err) {
            console.error(`[Steps] assign-medals failed for ${date}:`, err);
            res.status(500).send({ error: "Medal assignment failed" });
        }
    });

    app.get("/healthz", (_req: Request, res: Response) => {
        res.status(200).send("ok");
    });

    return app;
}

/**
 * Starts listening; rejects when the port cannot be bound (e.g. EADDRINUSE).
 */
export function listenOn(app: express.Express, port: number): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            server.off("error", reject);
            resolve(server);
        });
        server.once("error", reject);
    });
}

// Password via query (?password=...), header (x-admin-password), or body.password
function isAdmin(req: Request, adminPassword: string): boolean {
    const body = adminBodySchema.safeParse(req.body ?? {});
    const password = typeof req.query.password === "string"
        ? req.query.password
        : req.get("x-admin-password") ?? (body.success ? body.data.password : undefined);
    return password === adminPassword;
}
