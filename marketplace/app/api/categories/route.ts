import { CATEGORIES } from "@/lib/catalog";
import { ok, route } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = route("categories", async () => ok({ categories: CATEGORIES }));
