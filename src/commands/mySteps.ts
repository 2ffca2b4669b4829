// Implements the /mysteps command for the step tracker bot.
// Shows a user's step statistics for the last 30 days in an embed.

import { InteractionResponseType } from "discord-interactions";
import { APIEmbed } from "discord-api-types/v10";
import {
    Command,
    CommandContext,
    CommandData,
    getInvokingUserId,
    getStringOption,
    Interaction,
    replyText,
    Responder,
} from "./command";
import { PERSONAL_STATS_DAYS } from "../constants";
import { addDays, formatDisplayDate, todayIn } from "../step-tracker/dates";
import { formatNickname, formatSteps } from "../step-tracker/formatUtils";
import { summarizeSteps } from "../step-tracker/summarizeSteps";

/**
 * The /mysteps command displays days reported, total, average and best day.
 */
export class MyStepsCommand extends Command {
    public data: CommandData = {
        name: "mysteps",
        description: "Show step stats for the last 30 days.",
        type: 1, // CHAT_INPUT
        options: [
            {
                name: "nickname",
                description: "Nickname to look up (defaults to your own)",
                type: 3, // STRING
                required: false,
            },
        ],
    };

    /**
     * Looks up and displays the nickname's step stats.
     * @param interaction Discord interaction object
     * @param res Response object
     * @param context Stores and configuration
     */
    async execute(interaction: Interaction, res: Responder, context: CommandContext) {
        try {
            let nickname = getStringOption(interaction, "nickname")?.replace(/^#/, "") ?? null;
            if (!nickname) {
                const userId = getInvokingUserId(interaction);
                const profile = userId ? await context.stores.profiles.findByUserId(userId) : null;
                nickname = profile?.nickname ?? null;
            }
            if (!nickname) {
                replyText(res, "No nickname on file yet. Post a report with #nickname first, or pass nickname:.");
                return;
            }

            const to = todayIn(context.config.timeZone);
            const from = addDays(to, -(PERSONAL_STATS_DAYS - 1));
            const records = await context.stores.reports.queryRange(from, to);
            const stats = summarizeSteps(records, nickname, from, to);
            if (stats.daysReported === 0) {
                replyText(res, `No step reports for ${formatNickname(nickname)} in the last ${PERSONAL_STATS_DAYS} days.`);
                return;
            }

            const recent = stats.history
                .slice(-7)
                .map((r) => `${formatDisplayDate(r.date)}: ${formatSteps(r.steps)}`)
                .join("\n");
            const embed: APIEmbed = {
                color: 0x5865F2,
                title: `Step Stats for ${formatNickname(nickname)}`,
                description: `${formatDisplayDate(from)} – ${formatDisplayDate(to)}`,
                fields: [
                    { name: "Days Reported", value: stats.daysReported.toString(), inline: true },
                    { name: "Total Steps", value: formatSteps(stats.totalSteps), inline: true },
                    { name: "Average", value: stats.averageSteps !== null ? formatSteps(stats.averageSteps) : "N/A", inline: true },
                    {
                        name: "Best Day",
                        value: stats.bestDay ? `${formatSteps(stats.bestDay.steps)} (${formatDisplayDate(stats.bestDay.date)})` : "N/A",
                        inline: true,
                    },
                    { name: "Latest Reports", value: recent, inline: false },
                ],
                footer: { text: "Keep walking to climb the podium!" },
            };
            res.send({
                type: InteractionResponseType.CHANNEL_MESSAGE_WITH_SOURCE,
                data: { embeds: [embed] },
            });
        } catch (err) {
            console.error('[Steps] mySteps error:', err);
            replyText(res, `Error fetching step stats: ${err}`);
        }
    }
}
