import { createMetricsRegistry } from "@playroom/shared";

export const metrics = createMetricsRegistry({ service: "api" });

for (const reason of ["missing", "expired", "invalid_token", "invalid_claims", "unavailable"]) {
  metrics.incCounter("auth_failures_total", { reason }, 0);
}
for (const action of ["create", "join", "leave", "close", "approve", "accept", "status"]) {
  metrics.incCounter("room_transitions_total", { action }, 0);
}
