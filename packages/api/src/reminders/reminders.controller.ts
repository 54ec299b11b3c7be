import { Controller, Get, Delete, UseGuards } from "@nestjs/common";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import {
  NotificationSchedulerService,
  toNotificationResponse,
} from "./notification-scheduler.service";

@Controller("reminders")
@UseGuards(JwtAuthGuard)
export class RemindersController {
  constructor(private scheduler: NotificationSchedulerService) {}

  @Get("pending")
  pending(@CurrentUser("id") userId: string) {
    return this.scheduler.pending(userId).map(toNotificationResponse);
  }

  @Get("delivered")
  delivered(@CurrentUser("id") userId: string) {
    return this.scheduler.delivered(userId).map(toNotificationResponse);
  }

  @Delete()
  cancelAll(@CurrentUser("id") userId: string) {
    return this.scheduler.cancelAll(userId);
  }
}
