/**
 * Motivación: registrar el comando "marathon / unlock" para que un equipo empiece un puzzle.
 *
 * Alcance: el autocompletado solo ofrece puzzles que el equipo del usuario aún no empezó.
 */
import { createStringOption, Declare, Options, type CommandContext } from "seyfert";
import { ReportingSubCommand, invocationFor } from "@/adapters/seyfert";
import { getMarathonService, respondUnlockableAutocomplete } from "./shared";

const options = {
  puzzle: createStringOption({
    description: "the puzzle",
    required: true,
    autocomplete: respondUnlockableAutocomplete,
  }),
};

@Declare({
  name: "unlock",
  description: "Unlock a puzzle and start solving",
})
@Options(options)
export default class MarathonUnlockCommand extends ReportingSubCommand {
  async run(ctx: CommandContext<typeof options>) {
    await getMarathonService().unlock(invocationFor(ctx), ctx.options.puzzle);
  }
}
