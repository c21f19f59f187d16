import { publicUser } from "./auth";
import { ApiError } from "./http";
import { notify, notifyAdmins } from "./notifications";
import { getMany, getStore } from "./store";
import { newId, nowIso } from "./time";
import { refreshTrustScore } from "./trust";
import type { Product, PublicUser, Report, ReportedType, User, VerificationRequest } from "./types";

export type Page<T> = { items: T[]; total: number; page: number; pages: number };

function page<T>(items: T[], total: number, skip: number, limit: number): Page<T> {
  return { items, total, page: Math.floor(skip / limit) + 1, pages: Math.ceil(total / limit) };
}

export async function fileReport(
  reporter: User,
  input: { reported_type: ReportedType; reported_id: string; reason: string; description: string }
): Promise<Report> {
  const store = getStore();
  const duplicate = await store.count("reports", [
    ["reporter_id", "==", reporter.id],
    ["reported_type", "==", input.reported_type],
    ["reported_id", "==", input.reported_id]
  ]);
  if (duplicate > 0) throw new ApiError(400, "already_reported");

  const report: Report = {
    id: newId(),
    reporter_id: reporter.id,
    ...input,
    status: "pending",
    admin_action: null,
    admin_notes: null,
    resolved_by: null,
    resolved_at: null,
    created_at: nowIso()
  };
  await store.create("reports", report);

  if (input.reported_type === "user") {
    await store.increment("users", input.reported_id, "reports_received", 1);
    await refreshTrustScore(input.reported_id);
  }
  await notifyAdmins({
    type: "system",
    title: "New Report",
    message: `New ${input.reported_type} report: ${input.reason}`,
    link: "/admin/reports"
  });
  return report;
}

export type ReportView = Report & { reporter_name: string; reported_name: string };

export async function listReports(status: string | null, skip: number, limit: number): Promise<Page<ReportView>> {
  const store = getStore();
  const where = status ? [["status", "==", status] as const] : [];
  const reports = await store.list("reports", {
    where,
    orderBy: { field: "created_at", direction: "desc" },
    offset: skip,
    limit
  });
  const users = await getMany(
    store,
    "users",
    reports.flatMap((r) => (r.reported_type === "user" ? [r.reporter_id, r.reported_id] : [r.reporter_id]))
  );
  const products = await getMany(
    store,
    "products",
    reports.filter((r) => r.reported_type === "product").map((r) => r.reported_id)
  );

  const items = reports.map((r): ReportView => {
    let reported_name = "Message";
    if (r.reported_type === "user") reported_name = users.get(r.reported_id)?.name ?? "Unknown";
    if (r.reported_type === "product") reported_name = products.get(r.reported_id)?.title ?? "Unknown";
    return { ...r, reporter_name: users.get(r.reporter_id)?.name ?? "Unknown", reported_name };
  });
  return page(items, await store.count("reports", where), skip, limit);
}

export async function resolveReport(
  admin: User,
  reportId: string,
  input: { action: "dismiss" | "warn" | "ban"; notes?: string }
): Promise<Report> {
  const store = getStore();
  const report = await store.get("reports", reportId);
  if (!report) throw new ApiError(404, "report_not_found");

  const patch = {
    status: input.action === "dismiss" ? ("dismissed" as const) : ("resolved" as const),
    admin_action: input.action,
    admin_notes: input.notes ?? null,
    resolved_by: admin.id,
    resolved_at: nowIso()
  };
  await store.update("reports", reportId, patch);

  if (report.reported_type === "user" && input.action === "ban") {
    await banUser(report.reported_id);
    await notify(report.reported_id, {
      type: "system",
      title: "Account Suspended",
      message: "Your account has been suspended due to policy violations.",
      link: "/dashboard"
    });
  } else if (report.reported_type === "user" && input.action === "warn") {
    await notify(report.reported_id, {
      type: "system",
      title: "Warning",
      message: "You have received a warning. Please review our community guidelines.",
      link: "/faq"
    });
  }
  return { ...report, ...patch };
}

export async function requestVerification(user: User, documents: string[]): Promise<VerificationRequest> {
  const store = getStore();
  if (user.is_verified) throw new ApiError(400, "already_verified");
  const pending = await store.count("verification_requests", [
    ["user_id", "==", user.id],
    ["status", "==", "pending"]
  ]);
  if (pending > 0) throw new ApiError(400, "verification_pending");

  const now = nowIso();
  const request: VerificationRequest = {
    id: newId(),
    user_id: user.id,
    documents,
    email_verified: true,
    phone_verified: false,
    status: "pending",
    admin_notes: null,
    reviewed_by: null,
    reviewed_at: null,
    created_at: now
  };
  await store.create("verification_requests", request);
  await store.update("users", user.id, { verification_requested: true, verification_requested_at: now });
  await notifyAdmins({
    type: "system",
    title: "New Verification Request",
    message: `${user.name} requested account verification`,
    link: "/admin/verifications"
  });
  return request;
}

export type VerificationView = VerificationRequest & {
  user_name: string | null;
  user_email: string | null;
  user_trust_score: number;
  user_completed_transactions: number;
};

export async function listVerifications(status: string | null, skip: number, limit: number): Promise<Page<VerificationView>> {
  const store = getStore();
  const where = status ? [["status", "==", status] as const] : [];
  const requests = await store.list("verification_requests", {
    where,
    orderBy: { field: "created_at", direction: "desc" },
    offset: skip,
    limit
  });
  const users = await getMany(store, "users", requests.map((r) => r.user_id));
  const items = requests.map((r): VerificationView => {
    const u = users.get(r.user_id);
    return {
      ...r,
      user_name: u?.name ?? null,
      user_email: u?.email ?? null,
      user_trust_score: u?.trust_score ?? 50,
      user_completed_transactions: u?.completed_transactions ?? 0
    };
  });
  return page(items, await store.count("verification_requests", where), skip, limit);
}

export async function decideVerification(
  admin: User,
  requestId: string,
  input: { approved: boolean; notes?: string }
): Promise<VerificationRequest> {
  const store = getStore();
  const request = await store.get("verification_requests", requestId);
  if (!request) throw new ApiError(404, "verification_not_found");
  if (request.status !== "pending") throw new ApiError(400, "already_reviewed");

  const patch = {
    status: input.approved ? ("approved" as const) : ("rejected" as const),
    admin_notes: input.notes ?? null,
    reviewed_by: admin.id,
    reviewed_at: nowIso()
  };
  await store.update("verification_requests", requestId, patch);

  if (input.approved) {
    await store.update("users", request.user_id, { is_verified: true, verification_requested: false });
    await refreshTrustScore(request.user_id);
    await notify(request.user_id, {
      type: "system",
      title: "Verification Approved ✓",
      message: "Congratulations! Your account has been verified.",
      link: "/dashboard"
    });
  } else {
    await store.update("users", request.user_id, { verification_requested: false });
    await notify(request.user_id, {
      type: "system",
      title: "Verification Request",
      message: `Your verification request was not approved. ${input.notes ?? ""}`.trim(),
      link: "/dashboard"
    });
  }
  return { ...request, ...patch };
}

async function requireUserDoc(userId: string): Promise<User> {
  const user = await getStore().get("users", userId);
  if (!user) throw new ApiError(404, "user_not_found");
  return user;
}

export async function banUser(userId: string): Promise<void> {
  const user = await requireUserDoc(userId);
  if (user.is_admin) throw new ApiError(400, "cannot_ban_admin");
  await getStore().update("users", userId, { is_banned: true });
  // eslint-disable-next-line no-console
  console.log("[admin] user banned", userId);
}

export async function unbanUser(userId: string): Promise<void> {
  await requireUserDoc(userId);
  await getStore().update("users", userId, { is_banned: false });
}

export async function verifyUser(userId: string): Promise<void> {
  await requireUserDoc(userId);
  await getStore().update("users", userId, { is_verified: true, verification_requested: false });
  await refreshTrustScore(userId);
}

export async function listUsers(
  search: string | null,
  skip: number,
  limit: number
): Promise<{ users: PublicUser[]; total: number }> {
  const all = await getStore().list("users", { orderBy: { field: "created_at", direction: "desc" } });
  const needle = search?.trim().toLowerCase();
  const matched = needle
    ? all.filter((u) => u.name.toLowerCase().includes(needle) || u.email.toLowerCase().includes(needle))
    : all;
  return { users: matched.slice(skip, skip + limit).map(publicUser), total: matched.length };
}

export type AdminProductView = Product & { seller_email: string };

export async function listAllProducts(
  status: string | null,
  skip: number,
  limit: number
): Promise<{ products: AdminProductView[]; total: number }> {
  const store = getStore();
  const where = status === "sold" || status === "active" ? [["is_sold", "==", status === "sold"] as const] : [];
  const products = await store.list("products", {
    where,
    orderBy: { field: "created_at", direction: "desc" },
    offset: skip,
    limit
  });
  const sellers = await getMany(store, "users", products.map((p) => p.seller_id));
  return {
    products: products.map((p) => ({
      ...p,
      seller_name: sellers.get(p.seller_id)?.name ?? p.seller_name,
      seller_email: sellers.get(p.seller_id)?.email ?? "Unknown"
    })),
    total: await store.count("products", where)
  };
}

export async function removeProduct(productId: string): Promise<void> {
  if (!(await getStore().delete("products", productId))) throw new ApiError(404, "product_not_found");
}

export async function setFeatured(productId: string, featured: boolean): Promise<void> {
  if (!(await getStore().update("products", productId, { is_featured: featured }))) {
    throw new ApiError(404, "product_not_found");
  }
}
