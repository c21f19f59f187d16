import { requireUser } from "@/lib/auth";
import { ok, readBody, route } from "@/lib/http";
import { fileReport } from "@/lib/moderation";
import { reportCreateSchema } from "@/lib/schemas";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = route("reports create", async (request) => {
  const user = await requireUser(request);
  const input = await readBody(request, reportCreateSchema);
  const report = await fileReport(user, input);
  return ok({ report_id: report.id }, 201);
});
