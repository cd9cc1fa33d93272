import { Module } from "@nestjs/common";
import { InsightsController } from "./insights.controller";
import { InsightsService } from "./insights.service";
import { openAiProvider } from "./openai.provider";

@Module({
  controllers: [InsightsController],
  providers: [InsightsService, openAiProvider],
})
export class InsightsModule {}
