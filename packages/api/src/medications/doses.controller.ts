import {
  Controller,
  Get,
  Post,
  Body,
  Param,
  Query,
  HttpCode,
  UseGuards,
} from "@nestjs/common";
import { DosesService } from "./doses.service";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import {
  calendarQueryDto,
  markSkippedDto,
  markTakenDto,
  notificationActionDto,
  snoozeDto,
} from "@glucocare/shared";
import type {
  CalendarQueryDto,
  MarkSkippedDto,
  MarkTakenDto,
  NotificationActionDto,
  SnoozeDto,
} from "@glucocare/shared";

@Controller("doses")
@UseGuards(JwtAuthGuard)
export class DosesController {
  constructor(private doses: DosesService) {}

  @Get("today")
  today(@CurrentUser("id") userId: string) {
    return this.doses.today(userId);
  }

  @Get("upcoming")
  upcoming(@CurrentUser("id") userId: string) {
    return this.doses.upcoming(userId);
  }

  @Get("calendar")
  calendar(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(calendarQueryDto)) query: CalendarQueryDto,
  ) {
    return this.doses.calendar(userId, query.month);
  }

  @Post("actions")
  @HttpCode(200)
  action(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(notificationActionDto)) body: NotificationActionDto,
  ) {
    return this.doses.handleAction(userId, body);
  }

  @Post(":id/taken")
  @HttpCode(200)
  markTaken(
    @CurrentUser("id") userId: string,
    @Param("id") id: string,
    @Body(new ZodPipe(markTakenDto)) body: MarkTakenDto,
  ) {
    return this.doses.markTaken(userId, id, body);
  }

  @Post(":id/skip")
  @HttpCode(200)
  markSkipped(
    @CurrentUser("id") userId: string,
    @Param("id") id: string,
    @Body(new ZodPipe(markSkippedDto)) body: MarkSkippedDto,
  ) {
    return this.doses.markSkipped(userId, id, body.reason);
  }

  @Post(":id/snooze")
  @HttpCode(200)
  snooze(
    @CurrentUser("id") userId: string,
    @Param("id") id: string,
    @Body(new ZodPipe(snoozeDto)) body: SnoozeDto,
  ) {
    return this.doses.snooze(userId, id, body.minutes);
  }
}
