import { deleteAccount } from "@/lib/accounts";
import { publicUser, requireUser } from "@/lib/auth";
import { ApiError, ok, readBody, route } from "@/lib/http";
import { profileUpdateSchema } from "@/lib/schemas";
import { getStore } from "@/lib/store";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("users me", async (request) => {
  const user = await requireUser(request);
  return ok({ user: publicUser(user) });
});

export const PUT = route("users me update", async (request) => {
  const user = await requireUser(request);
  const patch = await readBody(request, profileUpdateSchema);
  if (Object.values(patch).every((v) => v === undefined)) throw new ApiError(400, "no_changes");

  await getStore().update("users", user.id, patch);
  return ok({ user: publicUser({ ...user, ...patch }) });
});

export const DELETE = route("users me delete", async (request) => {
  const user = await requireUser(request);
  await deleteAccount(user);
  return ok({ message: "Account and all associated data deleted" });
});
