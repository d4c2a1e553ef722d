import { Hono } from "hono";
import type { InFlightRegistry } from "../in-flight";

export function createHealthRoute(registry: InFlightRegistry): Hono {
  const healthRoute = new Hono();

  healthRoute.get("/", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      inFlight: registry.size,
    });
  });

  return healthRoute;
}
