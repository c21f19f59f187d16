import { config } from "@/lib/config";
import { ok, route } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("health", async () => ok({ status: "healthy", service: config.appName }));
