// Defines the base structure for all Discord slash commands used by the step tracker bot.

import { APIEmbed } from "discord-api-types/v10";
import { InteractionResponseType } from "discord-interactions";
import { z } from "zod";
import { AppConfig } from "../config";
import { ChatChannel, InteractionWebhook } from "../step-tracker/discordChannel";
import { CellSink } from "../step-tracker/sheetsService";
import { Stores } from "../step-tracker/stores";

/**
 * Represents a single option for a slash command (e.g., a parameter).
 */
export interface CommandOption {
    name: string;              // Name of the option
    description: string;       // Description shown in Discord
    type: number;              // Discord API type (e.g., 3 = STRING)
    required?: boolean;        // Whether this option is required
}

/**
 * Metadata for a Discord slash command.
 */
export interface CommandData {
    name: string;              // Command name (e.g., 'help')
    description: string;       // Command description
    type: number;              // Discord API type (1 = CHAT_INPUT)
    options?: CommandOption[]; // Optional parameters for the command
}

const interactionUserSchema = z.object({ id: z.string(), username: z.string().optional() });

/**
 * The parts of a Discord interaction payload the bot reads.
 */
export const interactionSchema = z.object({
    type: z.number(),
    token: z.string(),       // Valid for 15 minutes of follow-up edits
    data: z
        .object({
            name: z.string(),
            options: z
                .array(z.object({ name: z.string(), type: z.number(), value: z.union([z.string(), z.number(), z.boolean()]).optional() }))
                .optional(),
        })
        .optional(),
    member: z.object({ user: interactionUserSchema }).optional(),
    user: interactionUserSchema.optional(),
});

export type Interaction = z.infer<typeof interactionSchema>;

/**
 * Body of an interaction response.
 */
export interface InteractionReply {
    type: InteractionResponseType;
    data?: { content?: string; embeds?: APIEmbed[] };
}

/**
 * Where a command sends its response (an Express response in production).
 */
export interface Responder {
    send(body: InteractionReply): unknown;
}

/**
 * Everything a command may need, built once at startup.
 */
export interface CommandContext {
    config: AppConfig;
    stores: Stores;
    reportChannel: ChatChannel;
    sheet: CellSink | null;
    interactionWebhook: InteractionWebhook;
}

/**
 * Abstract base class for all step tracker commands.
 * Each command must define its metadata and implement the execute method.
 */
export abstract class Command {
    public abstract data: CommandData;
    /**
     * Executes the command logic.
     * @param interaction The Discord interaction object
     * @param res The response object
     * @param context Stores, channels and configuration
     */
    abstract execute(interaction: Interaction, res: Responder, context: CommandContext): Promise<void>;
}

/**
 * Replies with a plain message in the invoking channel.
 */
export function replyText(res: Responder, content: string): void {
    res.send({
        type: InteractionResponseType.CHANNEL_MESSAGE_WITH_SOURCE,
        data: { content },
    });
}

/**
 * Acknowledges the interaction now; the final text follows via InteractionWebhook.editOriginal.
 * Discord drops interactions left unanswered for 3 seconds.
 */
export function deferReply(res: Responder): void {
    res.send({ type: InteractionResponseType.DEFERRED_CHANNEL_MESSAGE_WITH_SOURCE });
}

/**
 * Reads a string option from an interaction, or undefined when absent.
 */
export function getStringOption(interaction: Interaction, name: string): string | undefined {
    const value = interaction.data?.options?.find((opt) => opt.name === name)?.value;
    return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/**
 * The id of the user who invoked the command (guild member or DM user).
 */
export function getInvokingUserId(interaction: Interaction): string | null {
    return interaction.member?.user.id ?? interaction.user?.id ?? null;
}
