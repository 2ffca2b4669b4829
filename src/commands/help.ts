import { InteractionResponseType } from "discord-interactions";
import { APIEmbed } from "discord-api-types/v10";
import { Command, CommandData, Interaction, Responder } from "./command";

export class HelpCommand extends Command {
    public data: CommandData = {
        name: "help",
        description: "Show how to report steps and the available commands.",
        type: 1, // CHAT_INPUT
    };

    async execute(_interaction: Interaction, res: Responder) {
        const embed: APIEmbed = {
            color: 0x57F287,
            title: "Step Tracker Help & Commands Guide",
            description: "Post a report in the steps channel, in any order: `#отчет #nickname 01.05.2024 8500`. "
                + "The date is optional (defaults to today) and the nickname is remembered after your first report.",
            fields: [
                {
                    name: "/medals date:DD.MM.YYYY",
                    value: "Show the medal standings for a day (yesterday by default). Example: `/medals date:01.05.2024`",
                },
                {
                    name: "/mysteps nickname:name",
                    value: "Show step stats for the last 30 days. Without a nickname, uses the one you report under.",
                },
                {
                    name: "/backfill date:YYYY-MM-DD",
                    value: "Import reports posted in the channel since a given date. Example: `/backfill date:2024-05-01`",
                },
                {
                    name: "/help",
                    value: "Show this help message.",
                },
            ],
            footer: { text: "Medals are awarded every evening for the previous day: 🥇 🥈 🥉" },
        };
        res.send({
            type: InteractionResponseType.CHANNEL_MESSAGE_WITH_SOURCE,
            data: {
                embeds: [embed],
            },
        });
    }
}
