/**
 * Middlewares registered on the client (`client.setServices({ middlewares })`).
 * Commands opt in by name with `@Middlewares([...])`.
 */
import { guardMiddleware } from "./guards/middleware";

export const middlewares = {
  guard: guardMiddleware,
};
