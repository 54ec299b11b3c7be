import { Module } from "@nestjs/common";
import { RemindersModule } from "../reminders/reminders.module";
import { DosesController } from "./doses.controller";
import { DosesService } from "./doses.service";
import { MedicationsController } from "./medications.controller";
import { MedicationsService } from "./medications.service";
import { ReminderRefreshCron } from "./reminder-refresh.cron";

@Module({
  imports: [RemindersModule],
  controllers: [MedicationsController, DosesController],
  providers: [MedicationsService, DosesService, ReminderRefreshCron],
  exports: [MedicationsService, DosesService],
})
export class MedicationsModule {}
