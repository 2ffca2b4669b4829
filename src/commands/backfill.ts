// Implements the /backfill command for the step tracker bot.
// Imports step reports posted in the channel since a given date.

import { Command, CommandContext, CommandData, deferReply, getStringOption, Interaction, replyText, Responder } from "./command";
import { ingestReports } from "../step-tracker/ingestReports";
import { parseIsoDate } from "../step-tracker/dates";

/**
 * The /backfill command runs report ingestion over a longer window.
 * Useful for first-time setup or after downtime; already processed messages are skipped.
 * The import outlasts Discord's response deadline, so the reply is deferred and edited afterwards.
 */
export class BackfillCommand extends Command {
    public data: CommandData = {
        name: "backfill",
        description: "Import step reports posted since a given date.",
        type: 1, // CHAT_INPUT
        options: [
            {
                name: "date",
                description: "The first date to import (YYYY-MM-DD)",
                type: 3, // STRING
                required: true,
            }
        ]
    };

    /**
     * Executes the import process, fetching messages and storing reports.
     * @param interaction Discord interaction object
     * @param res Response object
     * @param context Stores, channel and configuration
     */
    async execute(interaction: Interaction, res: Responder, context: CommandContext) {
        const dateStr = getStringOption(interaction, "date");
        if (!dateStr) {
            replyText(res, "You must provide a date (YYYY-MM-DD).");
            return;
        }
        if (!parseIsoDate(dateStr)) {
            replyText(res, "Invalid date format. Use YYYY-MM-DD.");
            return;
        }
        const since = new Date(`${dateStr}T00:00:00Z`);
        deferReply(res);

        let content: string;
        try {
            const summary = await ingestReports(since, {
                channel: context.reportChannel,
                messages: context.stores.messages,
                profiles: context.stores.profiles,
                reports: context.stores.reports,
                sheet: context.sheet,
                timeZone: context.config.timeZone,
            });
            content = `Backfill complete. ${summary.accepted} report(s) accepted, ${summary.rejected} rejected, `
                + `${summary.failed} failed, ${summary.duplicates} already processed since ${dateStr}.`;
        } catch (err) {
            console.error('[Steps] backfill error:', err);
            content = `Error during backfill: ${err}`;
        }

        try {
            await context.interactionWebhook.editOriginal(interaction.token, content);
        } catch (err) {
            console.error('[Steps] backfill: Failed to send the result:', err);
        }
    }
}
