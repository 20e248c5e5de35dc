import { ServiceInfoSchema } from "@filament/contracts";

export const SERVICE_NAME = "Filament Recognition Service";
export const SERVICE_VERSION = "1.0.0";

export async function GET(): Promise<Response> {
  return Response.json(
    ServiceInfoSchema.parse({ service: SERVICE_NAME, version: SERVICE_VERSION, status: "running" })
  );
}
