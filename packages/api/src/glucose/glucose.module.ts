import { Module } from "@nestjs/common";
import { MealsModule } from "../meals/meals.module";
import { GlucoseController } from "./glucose.controller";
import { GlucoseService } from "./glucose.service";

@Module({
  imports: [MealsModule],
  controllers: [GlucoseController],
  providers: [GlucoseService],
  exports: [GlucoseService],
})
export class GlucoseModule {}
