import type { AppContext } from "../context";

export async function GET(_req: Request, ctx: AppContext): Promise<Response> {
  return new Response(await ctx.metrics.register.metrics(), {
    status: 200,
    headers: { "content-type": ctx.metrics.register.contentType },
  });
}
