import { Module } from "@nestjs/common";
import { RemindersController } from "./reminders.controller";
import { NotificationSchedulerService } from "./notification-scheduler.service";
import { ReminderDispatchService } from "./reminder-dispatch.service";

@Module({
  controllers: [RemindersController],
  providers: [NotificationSchedulerService, ReminderDispatchService],
  exports: [NotificationSchedulerService],
})
export class RemindersModule {}
