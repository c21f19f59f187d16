import { requireUser } from "@/lib/auth";
import { ok, readBody, route } from "@/lib/http";
import { getPreferences, updatePreferences } from "@/lib/notifications";
import { preferencesUpdateSchema } from "@/lib/schemas";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("notifications preferences", async (request) => {
  const user = await requireUser(request);
  return ok({ preferences: await getPreferences(user.id) });
});

export const PUT = route("notifications preferences update", async (request) => {
  const user = await requireUser(request);
  const update = await readBody(request, preferencesUpdateSchema);
  return ok({ preferences: await updatePreferences(user.id, update) });
});
