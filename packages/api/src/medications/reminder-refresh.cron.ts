import { Injectable, Logger } from "@nestjs/common";
import { Cron, CronExpression } from "@nestjs/schedule";
import { MedicationsService } from "./medications.service";

@Injectable()
export class ReminderRefreshCron {
  private readonly logger = new Logger(ReminderRefreshCron.name);

  constructor(private medications: MedicationsService) {}

  @Cron(CronExpression.EVERY_DAY_AT_3AM)
  refresh() {
    const refreshed = this.medications.refreshAllReminders(new Date());
    this.logger.log(`Refreshed reminder windows for ${refreshed} medications`);
  }
}
