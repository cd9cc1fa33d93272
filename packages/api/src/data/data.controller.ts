import {
  BadRequestException,
  Controller,
  Get,
  Post,
  Query,
  Res,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from "@nestjs/common";
import { FileInterceptor } from "@nestjs/platform-express";
import type { Response } from "express";
import { exportGoalsQueryDto, exportMetricsQueryDto } from "@vitalog/shared";
import type { ExportGoalsQueryDto, ExportMetricsQueryDto } from "@vitalog/shared";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import { DataQualityService } from "./data-quality.service";
import { ExportService } from "./export.service";
import type { ExportFile } from "./export.service";
import { ImportService } from "./import.service";

const csvUpload = FileInterceptor("file", {
  limits: { fileSize: 5 * 1024 * 1024 },
});

@Controller("data")
@UseGuards(JwtAuthGuard)
export class DataController {
  constructor(
    private quality: DataQualityService,
    private exporter: ExportService,
    private importer: ImportService,
  ) {}

  @Get("status")
  status(@CurrentUser("id") userId: string) {
    return this.quality.status(userId);
  }

  @Get("quality")
  getQuality(@CurrentUser("id") userId: string) {
    return this.quality.quality(userId);
  }

  @Get("export/metrics")
  async exportMetrics(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(exportMetricsQueryDto)) query: ExportMetricsQueryDto,
    @Res() res: Response,
  ) {
    send(res, await this.exporter.exportMetrics(userId, query));
  }

  @Get("export/goals")
  async exportGoals(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(exportGoalsQueryDto)) query: ExportGoalsQueryDto,
    @Res() res: Response,
  ) {
    send(res, await this.exporter.exportGoals(userId, query));
  }

  @Post("import/metrics")
  @UseInterceptors(csvUpload)
  importMetrics(
    @CurrentUser("id") userId: string,
    @UploadedFile() file: Express.Multer.File | undefined,
  ) {
    return this.importer.importMetrics(userId, requireCsv(file));
  }

  @Post("import/goals")
  @UseInterceptors(csvUpload)
  importGoals(
    @CurrentUser("id") userId: string,
    @UploadedFile() file: Express.Multer.File | undefined,
  ) {
    return this.importer.importGoals(userId, requireCsv(file));
  }
}

function send(res: Response, file: ExportFile) {
  res.setHeader("Content-Type", file.contentType);
  res.setHeader("Content-Disposition", `attachment; filename="${file.filename}"`);
  res.send(file.buffer);
}

function requireCsv(file: Express.Multer.File | undefined): Buffer {
  if (!file) throw new BadRequestException("No file provided");
  return file.buffer;
}
