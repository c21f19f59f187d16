import { requireUser } from "@/lib/auth";
import { ok, route } from "@/lib/http";
import { MESSAGE_ATTACHMENT, readUpload, storeUpload } from "@/lib/uploads";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = route("upload file", async (request) => {
  await requireUser(request);
  return ok({ ...(await storeUpload(await readUpload(request), MESSAGE_ATTACHMENT)) }, 201);
});
