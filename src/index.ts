/**
 * Motivación: punto de arranque del bot del maratón de puzzles.
 *
 * Idea/concepto: lee la configuración del entorno, prepara el cliente de Seyfert con los
 * middlewares propios y sube los comandos antes de quedar escuchando interacciones.
 *
 * Alcance: orquesta el bootstrap; las reglas del maratón viven en `@/modules/marathon`.
 */
import "module-alias/register";
import "dotenv/config";

import type { ParseClient, ParseMiddlewares } from "seyfert";
import { Client } from "seyfert";
import { getBotConfig } from "@/configuration";
import { createLogger, setLogLevel } from "@/utils/logger";
import { middlewares } from "./middlewares";

const log = createLogger("bootstrap");

const client = new Client<true>();

client.setServices({
  middlewares,
});

async function bootstrap(): Promise<void> {
  const config = getBotConfig();
  setLogLevel(config.logLevel);

  log.info(`Starting bot (data in ${config.dataDir}, ${config.organizers.size} organizers)...`);
  await client.start();
  await client.uploadCommands({ cachePath: "./commands.json" });
}

bootstrap().catch((error: unknown) => {
  log.error("Failed to start bot:", error);
  process.exitCode = 1;
});

declare module "seyfert" {
  interface UsingClient extends ParseClient<Client<true>> {}
  interface RegisteredMiddlewares
    extends ParseMiddlewares<typeof middlewares> {}
}
