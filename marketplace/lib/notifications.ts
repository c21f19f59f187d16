import { ApiError } from "./http";
import { getStore } from "./store";
import { newId, nowIso } from "./time";
import {
  type Notification,
  type NotificationPreferences,
  type NotificationType
} from "./types";

export const NOTIFICATION_ICONS: Record<NotificationType, string> = {
  order: "📦",
  message: "💬",
  review: "⭐",
  support: "🎫",
  system: "🔔",
  sale: "💰",
  favorite: "❤️",
  price_drop: "💸"
};

export function defaultPreferences(userId: string): NotificationPreferences {
  return {
    id: userId,
    user_id: userId,
    email_notifications: true,
    notification_types: {
      order: true,
      message: true,
      review: true,
      support: true,
      system: true,
      sale: true,
      favorite: true,
      price_drop: false
    },
    quiet_hours: { enabled: false, start: "22:00", end: "08:00" },
    digest_enabled: false,
    digest_frequency: "daily",
    sound_enabled: true
  };
}

export async function getPreferences(userId: string): Promise<NotificationPreferences> {
  const store = getStore();
  const existing = await store.get("notification_preferences", userId);
  if (existing) return existing;
  return store.create("notification_preferences", defaultPreferences(userId));
}

export type NotifyInput = {
  type: NotificationType;
  title: string;
  message: string;
  link?: string | null;
};

/**
 * Stores an in-app notification unless the recipient switched the type off.
 * Resolves null when skipped.
 */
export async function notify(userId: string, input: NotifyInput): Promise<Notification | null> {
  const store = getStore();
  const prefs = await store.get("notification_preferences", userId);
  if (prefs && prefs.notification_types[input.type] === false) return null;

  const notification: Notification = {
    id: newId(),
    user_id: userId,
    type: input.type,
    title: input.title,
    message: input.message,
    link: input.link ?? null,
    icon: NOTIFICATION_ICONS[input.type],
    read: false,
    created_at: nowIso()
  };
  return store.create("notifications", notification);
}

export async function notifyAdmins(input: NotifyInput): Promise<number> {
  const admins = await getStore().list("users", { where: [["is_admin", "==", true]] });
  for (const admin of admins) await notify(admin.id, input);
  return admins.length;
}

export async function listNotifications(userId: string, limit: number): Promise<Notification[]> {
  return getStore().list("notifications", {
    where: [["user_id", "==", userId]],
    orderBy: { field: "created_at", direction: "desc" },
    limit
  });
}

export async function unreadCount(userId: string): Promise<number> {
  return getStore().count("notifications", [
    ["user_id", "==", userId],
    ["read", "==", false]
  ]);
}

async function ownNotification(userId: string, notificationId: string): Promise<Notification> {
  const notification = await getStore().get("notifications", notificationId);
  if (!notification || notification.user_id !== userId) throw new ApiError(404, "notification_not_found");
  return notification;
}

export async function markNotificationRead(userId: string, notificationId: string): Promise<void> {
  await ownNotification(userId, notificationId);
  await getStore().update("notifications", notificationId, { read: true });
}

export async function markAllNotificationsRead(userId: string): Promise<number> {
  return getStore().updateWhere(
    "notifications",
    [
      ["user_id", "==", userId],
      ["read", "==", false]
    ],
    { read: true }
  );
}

export async function deleteNotification(userId: string, notificationId: string): Promise<void> {
  await ownNotification(userId, notificationId);
  await getStore().delete("notifications", notificationId);
}

export async function clearNotifications(userId: string): Promise<number> {
  return getStore().deleteWhere("notifications", [["user_id", "==", userId]]);
}

export type PreferencesUpdate = Partial<Omit<NotificationPreferences, "id" | "user_id" | "notification_types">> & {
  notification_types?: Partial<Record<NotificationType, boolean>>;
};

/** Merges the update into the stored preferences; notification types merge per key. */
export async function updatePreferences(userId: string, update: PreferencesUpdate): Promise<NotificationPreferences> {
  const current = await getPreferences(userId);
  const { notification_types, ...rest } = update;
  const next: NotificationPreferences = {
    ...current,
    ...rest,
    notification_types: { ...current.notification_types, ...notification_types }
  };
  await getStore().create("notification_preferences", next);
  return next;
}
