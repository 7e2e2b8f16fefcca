/**
 * Motivación: registrar el comando "marathon / initialize" para que un organizador cargue
 * el roster de puzzles y equipos desde dos archivos YAML.
 *
 * Alcance: lee las URLs de los adjuntos y delega descarga, validación y persistencia en el
 * servicio del maratón.
 */
import { createAttachmentOption, Declare, Options, type CommandContext } from "seyfert";
import { ReportingSubCommand, invocationFor } from "@/adapters/seyfert";
import { getMarathonService } from "./shared";

const options = {
  puzzles: createAttachmentOption({
    description: "a puzzles.yaml file",
    required: true,
  }),
  teams: createAttachmentOption({
    description: "a teams.yaml file",
    required: true,
  }),
};

@Declare({
  name: "initialize",
  description: "Initialize a set of puzzles and teams",
})
@Options(options)
export default class MarathonInitializeCommand extends ReportingSubCommand {
  async run(ctx: CommandContext<typeof options>) {
    await getMarathonService().initialize(invocationFor(ctx), {
      puzzles: ctx.options.puzzles.url,
      teams: ctx.options.teams.url,
    });
  }
}
