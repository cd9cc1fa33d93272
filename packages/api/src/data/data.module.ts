import { Module } from "@nestjs/common";
import { DataController } from "./data.controller";
import { DataQualityService } from "./data-quality.service";
import { ExportService } from "./export.service";
import { ImportService } from "./import.service";

@Module({
  controllers: [DataController],
  providers: [DataQualityService, ExportService, ImportService],
})
export class DataModule {}
