import { beforeEach, describe, expect, it } from "vitest";
import { PUT as resolveRoute } from "@/app/api/admin/reports/[id]/resolve/route";
import { GET as usersRoute } from "@/app/api/admin/users/route";
import { POST as reportRoute } from "@/app/api/reports/route";
import {
  banUser,
  decideVerification,
  fileReport,
  listAllProducts,
  listReports,
  listVerifications,
  requestVerification,
  resolveReport,
  setFeatured,
  unbanUser
} from "@/lib/moderation";
import { createListing, createUser, installFakes, jsonRequest, none, type Harness, type TestUser } from "./helpers";

describe("reports", () => {
  let h: Harness;
  let admin: TestUser;
  let reporter: TestUser;
  let target: TestUser;

  beforeEach(async () => {
    h = installFakes();
    admin = await createUser({ is_admin: true, name: "Ada Admin" });
    reporter = await createUser({ name: "Rita Reporter" });
    target = await createUser({ name: "Tom Target" });
  });

  const spam = () => ({
    reported_type: "user" as const,
    reported_id: target.user.id,
    reason: "Spam",
    description: "Posts the same ad every hour"
  });

  it("files a report once, lowers the reported user's trust and alerts admins", async () => {
    const res = await reportRoute(jsonRequest("/api/reports", "POST", spam(), reporter.token), none);
    expect(res.status).toBe(201);
    expect((await res.json()).report_id).toEqual(expect.any(String));

    const reported = await h.store.get("users", target.user.id);
    expect(reported?.reports_received).toBe(1);
    expect(reported?.trust_score).toBe(45);

    const alerts = await h.store.list("notifications", { where: [["user_id", "==", admin.user.id]] });
    expect(alerts.map((n) => [n.title, n.message])).toEqual([["New Report", "New user report: Spam"]]);

    await expect(fileReport(reporter.user, spam())).rejects.toMatchObject({ status: 400, code: "already_reported" });
  });

  it("names the reported user or listing in the admin list", async () => {
    const listing = await createListing(target.user, { title: "Fake sneakers" });
    await fileReport(reporter.user, spam());
    await fileReport(reporter.user, {
      reported_type: "product",
      reported_id: listing.id,
      reason: "Counterfeit",
      description: "Clearly not the real brand"
    });

    const page = await listReports("pending", 0, 10);
    expect(page.total).toBe(2);
    expect(page.page).toBe(1);
    expect(page.pages).toBe(1);
    expect(page.items.map((r) => [r.reporter_name, r.reported_name]).sort()).toEqual([
      ["Rita Reporter", "Fake sneakers"],
      ["Rita Reporter", "Tom Target"]
    ]);
  });

  it("bans the reported user on a ban resolution", async () => {
    const report = await fileReport(reporter.user, spam());
    const res = await resolveRoute(
      jsonRequest(`/api/admin/reports/${report.id}/resolve`, "PUT", { action: "ban", notes: "Repeat offender" }, admin.token),
      { params: { id: report.id } }
    );
    expect((await res.json()).report).toMatchObject({ status: "resolved", admin_action: "ban", resolved_by: admin.user.id });
    expect((await h.store.get("users", target.user.id))?.is_banned).toBe(true);

    const notes = await h.store.list("notifications", { where: [["user_id", "==", target.user.id]] });
    expect(notes.map((n) => n.title)).toEqual(["Account Suspended"]);
  });

  it("marks dismissed reports as dismissed and warns on warn", async () => {
    const first = await fileReport(reporter.user, spam());
    expect((await resolveReport(admin.user, first.id, { action: "dismiss" })).status).toBe("dismissed");

    const other = await createUser();
    const second = await fileReport(other.user, spam());
    await resolveReport(admin.user, second.id, { action: "warn" });
    const notes = await h.store.list("notifications", { where: [["user_id", "==", target.user.id]] });
    expect(notes.map((n) => n.title)).toEqual(["Warning"]);
  });
});

describe("verification", () => {
  let h: Harness;
  let admin: TestUser;

  beforeEach(async () => {
    h = installFakes();
    admin = await createUser({ is_admin: true });
  });

  it("runs a request through approval", async () => {
    const { user } = await createUser({ name: "Vera" });
    const request = await requestVerification(user, ["https://example.com/id.jpg"]);
    expect((await h.store.get("users", user.id))?.verification_requested).toBe(true);
    await expect(requestVerification(user, [])).rejects.toMatchObject({ code: "verification_pending" });

    const page = await listVerifications("pending", 0, 20);
    expect(page.items.map((r) => [r.user_name, r.user_trust_score])).toEqual([["Vera", 50]]);

    const decided = await decideVerification(admin.user, request.id, { approved: true });
    expect(decided.status).toBe("approved");
    const verified = await h.store.get("users", user.id);
    expect(verified).toMatchObject({ is_verified: true, verification_requested: false, trust_score: 60 });

    const notes = await h.store.list("notifications", { where: [["user_id", "==", user.id]] });
    expect(notes.map((n) => n.title)).toEqual(["Verification Approved ✓"]);

    await expect(decideVerification(admin.user, request.id, { approved: false })).rejects.toMatchObject({
      code: "already_reviewed"
    });
    if (!verified) throw new Error("user missing");
    await expect(requestVerification(verified, [])).rejects.toMatchObject({ code: "already_verified" });
  });

  it("tells the user why a request was rejected", async () => {
    const { user } = await createUser();
    const request = await requestVerification(user, []);
    await decideVerification(admin.user, request.id, { approved: false, notes: "Blurry photo" });

    const [note] = await h.store.list("notifications", { where: [["user_id", "==", user.id]] });
    expect(note.message).toBe("Your verification request was not approved. Blurry photo");
    expect((await h.store.get("users", user.id))?.is_verified).toBe(false);
  });
});

describe("admin user and listing management", () => {
  let h: Harness;
  let admin: TestUser;

  beforeEach(async () => {
    h = installFakes();
    admin = await createUser({ is_admin: true, name: "Ada Admin" });
  });

  it("searches users by name or email", async () => {
    await createUser({ name: "Karel Appel" });
    await createUser({ name: "Someone", email: "karel@example.org" });
    await createUser({ name: "Nobody" });

    const res = await usersRoute(jsonRequest("/api/admin/users?search=KAREL", "GET", undefined, admin.token), none);
    const body = await res.json();
    expect(body.total).toBe(2);
    expect(body.users.every((u: Record<string, unknown>) => !("hashed_password" in u))).toBe(true);
  });

  it("bans and unbans users but never admins", async () => {
    const { user } = await createUser();
    await banUser(user.id);
    expect((await h.store.get("users", user.id))?.is_banned).toBe(true);
    await unbanUser(user.id);
    expect((await h.store.get("users", user.id))?.is_banned).toBe(false);

    await expect(banUser(admin.user.id)).rejects.toMatchObject({ status: 400, code: "cannot_ban_admin" });
    await expect(banUser("missing")).rejects.toMatchObject({ status: 404, code: "user_not_found" });
  });

  it("filters listings by sold state and toggles featuring", async () => {
    const { user: seller } = await createUser({ email: "seller@example.com" });
    const active = await createListing(seller);
    await createListing(seller, { is_sold: true });

    const sold = await listAllProducts("sold", 0, 10);
    expect(sold.total).toBe(1);
    expect(sold.products[0].seller_email).toBe("seller@example.com");
    expect((await listAllProducts(null, 0, 10)).total).toBe(2);

    await setFeatured(active.id, true);
    expect((await h.store.get("products", active.id))?.is_featured).toBe(true);
    await expect(setFeatured("missing", true)).rejects.toMatchObject({ status: 404 });
  });
});
