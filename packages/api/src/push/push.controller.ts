import { Controller, Post, Delete, Body, UseGuards } from "@nestjs/common";
import { z } from "zod";
import { PushService } from "./push.service";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import { pushSubscriptionDto } from "@glucocare/shared";
import type { PushSubscriptionDto } from "@glucocare/shared";

const unsubscribeDto = z.object({ endpoint: z.string().url() });

@Controller("push")
@UseGuards(JwtAuthGuard)
export class PushController {
  constructor(private push: PushService) {}

  @Post("subscribe")
  subscribe(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(pushSubscriptionDto)) body: PushSubscriptionDto,
  ) {
    return this.push.subscribe(userId, body);
  }

  @Delete("subscribe")
  unsubscribe(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(unsubscribeDto)) body: z.infer<typeof unsubscribeDto>,
  ) {
    return this.push.unsubscribe(userId, body.endpoint);
  }
}
