/**
 * Motivación: registrar el comando "marathon / submit" para entregar la solución de un
 * puzzle desbloqueado.
 */
import { createStringOption, Declare, Options, type CommandContext } from "seyfert";
import { ReportingSubCommand, invocationFor } from "@/adapters/seyfert";
import { getMarathonService, respondSubmittableAutocomplete } from "./shared";

const options = {
  puzzle: createStringOption({
    description: "the puzzle",
    required: true,
    autocomplete: respondSubmittableAutocomplete,
  }),
  link: createStringOption({
    description: "a message link for your solution",
    required: true,
  }),
};

@Declare({
  name: "submit",
  description: "Submit a solution to an unlocked puzzle",
})
@Options(options)
export default class MarathonSubmitCommand extends ReportingSubCommand {
  async run(ctx: CommandContext<typeof options>) {
    await getMarathonService().submit(invocationFor(ctx), ctx.options.puzzle, ctx.options.link);
  }
}
