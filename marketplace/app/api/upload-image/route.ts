import { requireUser } from "@/lib/auth";
import { ok, route } from "@/lib/http";
import { PRODUCT_IMAGE, readUpload, storeUpload } from "@/lib/uploads";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = route("upload image", async (request) => {
  await requireUser(request);
  const { url, name } = await storeUpload(await readUpload(request), PRODUCT_IMAGE);
  return ok({ url, filename: name }, 201);
});
