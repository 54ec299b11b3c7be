import { Inject, Injectable, Logger } from "@nestjs/common";
import * as webPush from "web-push";
import { and, eq } from "drizzle-orm";
import { APP_CONFIG, AppConfig } from "../common/config";
import { DatabaseService } from "../database/database.service";
import { pushSubscriptions } from "../database/schema";
import type { PushSubscriptionDto } from "@glucocare/shared";

export interface PushPayload {
  title: string;
  body: string;
  category?: string;
  actions?: Array<{ action: string; title: string }>;
  data?: Record<string, string | null>;
}

export interface PushResult {
  sent: number;
  total: number;
}

@Injectable()
export class PushService {
  private readonly logger = new Logger(PushService.name);
  private readonly enabled: boolean;

  constructor(
    private database: DatabaseService,
    @Inject(APP_CONFIG) config: Pick<AppConfig, "vapid">,
  ) {
    this.enabled = config.vapid !== null;
    if (config.vapid) {
      webPush.setVapidDetails(
        config.vapid.email,
        config.vapid.publicKey,
        config.vapid.privateKey,
      );
    } else {
      this.logger.warn("VAPID keys not configured, push delivery disabled");
    }
  }

  subscribe(userId: string, dto: PushSubscriptionDto) {
    return this.database.db
      .insert(pushSubscriptions)
      .values({
        userId,
        endpoint: dto.endpoint,
        p256dh: dto.keys.p256dh,
        auth: dto.keys.auth,
      })
      .onConflictDoUpdate({
        target: pushSubscriptions.endpoint,
        set: { userId, p256dh: dto.keys.p256dh, auth: dto.keys.auth },
      })
      .returning()
      .get();
  }

  unsubscribe(userId: string, endpoint: string) {
    this.database.db
      .delete(pushSubscriptions)
      .where(and(eq(pushSubscriptions.userId, userId), eq(pushSubscriptions.endpoint, endpoint)))
      .run();
    return { deleted: true };
  }

  hasSubscriptions(userId: string): boolean {
    const row = this.database.db
      .select({ id: pushSubscriptions.id })
      .from(pushSubscriptions)
      .where(eq(pushSubscriptions.userId, userId))
      .get();
    return row !== undefined;
  }

  async sendToUser(userId: string, payload: PushPayload): Promise<PushResult> {
    const subscriptions = this.database.db
      .select()
      .from(pushSubscriptions)
      .where(eq(pushSubscriptions.userId, userId))
      .all();

    if (!this.enabled) {
      return { sent: 0, total: subscriptions.length };
    }

    const results = await Promise.allSettled(
      subscriptions.map((sub) =>
        webPush
          .sendNotification(
            {
              endpoint: sub.endpoint,
              keys: { p256dh: sub.p256dh, auth: sub.auth },
            },
            JSON.stringify(payload),
          )
          .catch((err: unknown) => {
            if (
              err instanceof webPush.WebPushError &&
              (err.statusCode === 404 || err.statusCode === 410)
            ) {
              this.database.db
                .delete(pushSubscriptions)
                .where(eq(pushSubscriptions.id, sub.id))
                .run();
              this.logger.warn(`Removed expired subscription ${sub.id}`);
            }
            throw err;
          }),
      ),
    );

    const sent = results.filter((r) => r.status === "fulfilled").length;
    this.logger.debug(`Push sent to ${sent}/${subscriptions.length} subscriptions for user ${userId}`);
    return { sent, total: subscriptions.length };
  }
}
