// Main entry point for the Discord Step Tracker Bot
// Serves Discord interactions and schedules report ingestion and the daily medal job.

import "dotenv/config";
import { initializeApp } from "firebase-admin/app";
import { getFirestore } from "firebase-admin/firestore";
import { CommandContext } from "./commands/command";
import { loadConfig } from "./config";
import { startScheduler } from "./scheduler";
import { createServer, listenOn } from "./server";
import { assignMedalsForDay, MedalDependencies } from "./step-tracker/assignMedals";
import { IsoDate, yesterdayIn } from "./step-tracker/dates";
import { DiscordChannel, DiscordInteractionWebhook } from "./step-tracker/discordChannel";
import { createFirestoreStores } from "./step-tracker/firestoreStores";
import { IngestDependencies, ingestReports } from "./step-tracker/ingestReports";
import { createMemoryStores } from "./step-tracker/memoryStores";
import { SheetsService } from "./step-tracker/sheetsService";

async function bootstrap() {
    const config = loadConfig();

    const stores = config.storeBackend === "firestore"
        ? createFirestoreStores(getFirestore(initializeApp()))
        : createMemoryStores();
    console.log(`[Steps] Using ${config.storeBackend} store`);

    const reportChannel = new DiscordChannel(config.discord.reportChannelId, config.discord.botToken);
    const summaryChannel = new DiscordChannel(config.discord.medalChannelId, config.discord.botToken);
    const sheet = config.sheet
        ? new SheetsService(config.sheet.credentialsPath, config.sheet.spreadsheetId, config.sheet.worksheet)
        : null;
    if (!sheet) {
        console.log("[Steps] GOOGLE_SHEET_ID not set, sheet mirroring disabled");
    }

    const ingestDeps: IngestDependencies = {
        channel: reportChannel,
        messages: stores.messages,
        profiles: stores.profiles,
        reports: stores.reports,
        sheet,
        timeZone: config.timeZone,
    };
    const medalDeps: MedalDependencies = {
        reports: stores.reports,
        awards: stores.awards,
        sheet,
        summaryChannel,
    };
    const assignMedals = (date: IsoDate) => assignMedalsForDay(date, medalDeps);

    const interactionWebhook = new DiscordInteractionWebhook(config.discord.applicationId, config.discord.botToken);
    const commandContext: CommandContext = { config, stores, reportChannel, sheet, interactionWebhook };
    const app = createServer({ commandContext, assignMedals });

    await listenOn(app, config.port);
    console.log(`[Steps] HTTP ready on port ${config.port}`);

    startScheduler(config, {
        ingest: () => ingestReports(new Date(Date.now() - config.ingest.lookbackMinutes * 60 * 1000), ingestDeps),
        medals: () => assignMedals(yesterdayIn(config.timeZone)),
    });
}

bootstrap().catch((err) => {
    console.error("[Steps] Fatal error:", err);
    process.exit(1);
});
