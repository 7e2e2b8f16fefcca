/**
 * Marathon command helpers.
 *
 * The service instance every subcommand talks to, and the autocomplete responders for
 * the `team` and `puzzle` options. Kept to plain functions so each subcommand stays a
 * thin adapter.
 */
import type { AutocompleteInteraction } from "seyfert";

import { candidateFromInteraction, fetchAttachmentText } from "@/adapters/seyfert";
import { getBotConfig } from "@/configuration";
import { MarathonRepository, createMarathonService, type MarathonService } from "@/modules/marathon";

let service: MarathonService | null = null;

export function getMarathonService(): MarathonService {
  if (!service) {
    const config = getBotConfig();
    service = createMarathonService({
      repository: new MarathonRepository(config.dataDir),
      organizers: config.organizers,
      fetchAttachment: fetchAttachmentText,
    });
  }
  return service;
}

export async function respondTeamAutocomplete(interaction: AutocompleteInteraction): Promise<void> {
  const choices = await getMarathonService().autocompleteTeams(interaction.getInput() ?? "");
  await interaction.respond(choices);
}

export async function respondUnlockableAutocomplete(interaction: AutocompleteInteraction): Promise<void> {
  const choices = await getMarathonService().autocompleteUnlockable(
    candidateFromInteraction(interaction),
    interaction.getInput() ?? "",
  );
  await interaction.respond(choices);
}

export async function respondSubmittableAutocomplete(interaction: AutocompleteInteraction): Promise<void> {
  const choices = await getMarathonService().autocompleteSubmittable(
    candidateFromInteraction(interaction),
    interaction.getInput() ?? "",
  );
  await interaction.respond(choices);
}
