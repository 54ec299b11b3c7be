import { Controller, Get, Query, Res, UseGuards } from "@nestjs/common";
import { Throttle, ThrottlerGuard } from "@nestjs/throttler";
import type { Response } from "express";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import { exportQueryDto } from "@glucocare/shared";
import type { ExportQueryDto } from "@glucocare/shared";
import { ExportService } from "./export.service";

@Controller("export")
@UseGuards(JwtAuthGuard, ThrottlerGuard)
export class ExportController {
  constructor(private exportService: ExportService) {}

  @Get()
  @Throttle({ default: { limit: 5, ttl: 60_000 } })
  async export(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(exportQueryDto)) query: ExportQueryDto,
    @Res() res: Response,
  ) {
    const buffer = await this.exportService.generateXlsx(userId, query);
    const date = new Date().toISOString().split("T")[0];
    res.setHeader(
      "Content-Type",
      "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
    );
    res.setHeader("Content-Disposition", `attachment; filename="glucocare-export-${date}.xlsx"`);
    res.send(buffer);
  }
}
