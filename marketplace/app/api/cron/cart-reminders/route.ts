import { requireCronOrAdmin } from "@/lib/auth";
import { sendCartReminders } from "@/lib/cart";
import { ok, route } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const handler = route("cron cart-reminders", async (request) => {
  await requireCronOrAdmin(request);
  return ok({ ...(await sendCartReminders()) });
});

// Schedulers call with GET; manual runs use POST.
export const GET = handler;
export const POST = handler;
