/**
 * Motivación: agrupar los comandos del maratón de puzzles bajo `/marathon`.
 *
 * Idea/concepto: comando raíz de Seyfert con `@AutoLoad()`, que registra como subcomandos
 * todos los archivos de esta carpeta.
 *
 * Alcance: solo declara el grupo; cada subcomando delega en el servicio del maratón.
 */
import { AutoLoad, Command, Declare } from "seyfert";
import { getBotConfig } from "@/configuration";

const homeGuildId = getBotConfig().homeGuildId;

// Espacio raiz de comandos del maratón.
@Declare({
  name: "marathon",
  description: "Unlock, solve and submit marathon puzzles",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
  guildId: homeGuildId ? [homeGuildId] : undefined,
})
@AutoLoad()
export default class MarathonParentCommand extends Command {}
