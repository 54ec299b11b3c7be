import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  UseGuards,
} from "@nestjs/common";
import { MedicationsService } from "./medications.service";
import { DosesService } from "./doses.service";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import {
  adherenceQueryDto,
  createMedicationDto,
  medicationQueryDto,
  updateMedicationDto,
} from "@glucocare/shared";
import type {
  AdherenceQueryDto,
  CreateMedicationDto,
  MedicationQueryDto,
  UpdateMedicationDto,
} from "@glucocare/shared";

@Controller("medications")
@UseGuards(JwtAuthGuard)
export class MedicationsController {
  constructor(
    private medications: MedicationsService,
    private doses: DosesService,
  ) {}

  @Post()
  create(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(createMedicationDto)) body: CreateMedicationDto,
  ) {
    return this.medications.create(userId, body);
  }

  @Get()
  findAll(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(medicationQueryDto)) query: MedicationQueryDto,
  ) {
    return this.medications.findAll(userId, query.active ?? false);
  }

  @Get("adherence")
  overallAdherence(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(adherenceQueryDto)) query: AdherenceQueryDto,
  ) {
    return this.doses.overallAdherence(userId, query.period);
  }

  @Get(":id")
  findOne(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.medications.findOne(userId, id);
  }

  @Patch(":id")
  update(
    @CurrentUser("id") userId: string,
    @Param("id") id: string,
    @Body(new ZodPipe(updateMedicationDto)) body: UpdateMedicationDto,
  ) {
    return this.medications.update(userId, id, body);
  }

  @Delete(":id")
  remove(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.medications.remove(userId, id);
  }

  @Post(":id/reminders")
  scheduleReminders(@CurrentUser("id") userId: string, @Param("id") id: string) {
    return this.medications.scheduleReminders(userId, id);
  }

  @Get(":id/adherence")
  adherenceReport(
    @CurrentUser("id") userId: string,
    @Param("id") id: string,
    @Query(new ZodPipe(adherenceQueryDto)) query: AdherenceQueryDto,
  ) {
    return this.doses.adherenceReport(userId, id, query.period);
  }
}
