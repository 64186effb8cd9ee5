/**
 * Emoji Tally — src/lib/errorCard.ts
 * WHAT: Posts the generic "something went wrong" card to the invoking interaction.
 * WHY: Interactions should never go silent; users get a trace id to quote, logs get the details.
 * FLOWS: build embed → replyOrEdit (ephemeral unless it replaces a public deferral)
 * DOCS:
 *  - Interaction replies (flags): https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder, MessageFlags, type ChatInputCommandInteraction } from "discord.js";
import { logger } from "./logger.js";
import { replyOrEdit } from "./cmdWrap.js";
import { classifyError, isInteractionExpired } from "./errors.js";

export const GENERIC_ERROR_MESSAGE =
  "Something went wrong while running this command. Please try again later.";

type ErrorCardDetails = {
  traceId: string;
  cmd: string;
  phase: string;
};

/**
 * Build the card. Internal error text stays in the logs; the user only sees
 * the generic message and the trace id.
 */
export function buildErrorCard(details: ErrorCardDetails): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle("Command Error")
    .setColor(0xed4245)
    .setDescription(GENERIC_ERROR_MESSAGE)
    .addFields({ name: "Trace", value: details.traceId, inline: true });
}

/**
 * postErrorCard
 * WHAT: Sends the error card as an ephemeral reply, or replaces the deferred
 *       reply. A replaced reply keeps the deferral's visibility, so after a
 *       public defer the card (trace id only) is public too.
 * RETURNS: Promise<void>; delivery failures are logged, never thrown.
 */
export async function postErrorCard(
  interaction: ChatInputCommandInteraction,
  details: ErrorCardDetails
) {
  try {
    await replyOrEdit(interaction, {
      embeds: [buildErrorCard(details)],
      flags: MessageFlags.Ephemeral,
    });
  } catch (err) {
    if (isInteractionExpired(classifyError(err))) {
      logger.warn(
        { err, traceId: details.traceId, evt: "error_card_expired" },
        "error card skipped; interaction expired"
      );
      return;
    }
    logger.error(
      { err, traceId: details.traceId, cmd: details.cmd, phase: details.phase, evt: "error_card_fail" },
      "failed to deliver error card"
    );
  }
}
