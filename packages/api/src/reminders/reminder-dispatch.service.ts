import { Injectable, Logger } from "@nestjs/common";
import { Cron, CronExpression } from "@nestjs/schedule";
import { NotificationSchedulerService } from "./notification-scheduler.service";

@Injectable()
export class ReminderDispatchService {
  private readonly logger = new Logger(ReminderDispatchService.name);
  private running = false;

  constructor(private scheduler: NotificationSchedulerService) {}

  @Cron(CronExpression.EVERY_MINUTE)
  async dispatch() {
    // A slow push round must not overlap the next tick
    if (this.running) {
      this.logger.debug("Previous dispatch still running, skipping tick");
      return;
    }

    this.running = true;
    try {
      const delivered = await this.scheduler.dispatchDue(new Date());
      if (delivered > 0) {
        this.logger.log(`Delivered ${delivered} medication reminders`);
      }
    } catch (err) {
      this.logger.error(`Reminder dispatch failed: ${err}`);
    } finally {
      this.running = false;
    }
  }
}
