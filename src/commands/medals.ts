// Implements the /medals command for the step tracker bot.
// Shows the medal standings for a day without changing stored awards.

import { Command, CommandContext, CommandData, getStringOption, Interaction, replyText, Responder } from "./command";
import { formatDisplayDate, IsoDate, parseIsoDate, todayIn, yearIn, yesterdayIn } from "../step-tracker/dates";
import { renderMedalSummary } from "../step-tracker/formatUtils";
import { parseReportDate } from "../step-tracker/parseStepReport";
import { rankMedals } from "../step-tracker/rankMedals";

/**
 * The /medals command ranks the reports of a day and prints the podium.
 */
export class MedalsCommand extends Command {
    public data: CommandData = {
        name: "medals",
        description: "Show the medal standings for a day.",
        type: 1, // CHAT_INPUT
        options: [
            {
                name: "date",
                description: "Day to show (DD.MM.YYYY or YYYY-MM-DD, defaults to yesterday)",
                type: 3, // STRING
                required: false,
            },
        ],
    };

    async execute(interaction: Interaction, res: Responder, context: CommandContext) {
        const timeZone = context.config.timeZone;
        const dateStr = getStringOption(interaction, "date");
        let date: IsoDate | null = yesterdayIn(timeZone);
        if (dateStr) {
            date = parseIsoDate(dateStr) ?? parseReportDate(dateStr, yearIn(new Date(), timeZone));
            if (!date) {
                replyText(res, "Invalid date format. Use DD.MM.YYYY or YYYY-MM-DD.");
                return;
            }
        }
        if (date > todayIn(timeZone)) {
            replyText(res, `No medals for ${formatDisplayDate(date)} yet.`);
            return;
        }

        try {
            const records = await context.stores.reports.queryDay(date);
            if (records.length === 0) {
                replyText(res, `No step reports for ${formatDisplayDate(date)}.`);
                return;
            }
            replyText(res, renderMedalSummary(date, rankMedals(records)));
        } catch (err) {
            console.error('[Steps] medals error:', err);
            replyText(res, `Error loading medals: ${err}`);
        }
    }
}
