import type { HealthResponse } from "@filament/contracts";

export async function GET(): Promise<Response> {
  const body: HealthResponse = { status: "healthy" };
  return Response.json(body);
}
