import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Query,
  Req,
  UnprocessableEntityException,
  UseGuards,
  ValidationPipe,
} from '@nestjs/common';
import type { FastifyRequest } from 'fastify';
import { VALIDATION_PIPE_OPTIONS } from '@/shared/common/validation/validation-options';
import type {
  BanCheckTask,
  TaskPage,
} from '@/shared/ban-check/interfaces/task.interface';
import { CurrentCaller } from '../auth/decorators/current-caller.decorator';
import type { Caller } from '../auth/entities/caller.entity';
import { ApiKeyGuard } from '../guards/api-key.guard';
import { PollingThrottleGuard } from '../guards/polling-throttle.guard';
import { BanCheckService, SubmissionReceipt } from './ban-check.service';
import { ListTasksQueryDto } from './dto/list-tasks-query.dto';
import { SubmitCsvFieldsDto } from './dto/submit-csv.dto';
import {
  SubmitSteamIdsDto,
  SubmitSteamIdsFormDto,
} from './dto/submit-steam-ids.dto';
import {
  CSV_FILE_FIELD,
  formBody,
  MultipartUpload,
  PROXY_FILE_FIELD,
  readMultipartUpload,
} from './multipart-upload';

@Controller('ban-check')
@UseGuards(ApiKeyGuard)
export class BanCheckController {
  private readonly logger = new Logger(BanCheckController.name);
  private readonly fieldsPipe = new ValidationPipe(VALIDATION_PIPE_OPTIONS);

  constructor(private readonly banCheckService: BanCheckService) {}

  @Post('check/steamids')
  @HttpCode(HttpStatus.ACCEPTED)
  submitSteamIds(
    @CurrentCaller() caller: Caller,
    @Body() dto: SubmitSteamIdsDto,
  ): Promise<SubmissionReceipt> {
    return this.banCheckService.submitIdentifiers(caller, dto.steamIds, dto.options);
  }

  @Post('check/steamids/form')
  @HttpCode(HttpStatus.ACCEPTED)
  async submitSteamIdsForm(
    @CurrentCaller() caller: Caller,
    @Req() req: FastifyRequest,
  ): Promise<SubmissionReceipt> {
    const upload = await this.readUpload(req);
    const dto = await this.validateFields(
      formBody(upload.fields, ['steamIds']),
      SubmitSteamIdsFormDto,
    );

    const { steamIds, ...options } = dto;
    return this.banCheckService.submitIdentifiers(
      caller,
      steamIds,
      options,
      upload.files.get(PROXY_FILE_FIELD),
    );
  }

  @Post('check/csv')
  @HttpCode(HttpStatus.ACCEPTED)
  async submitCsv(
    @CurrentCaller() caller: Caller,
    @Req() req: FastifyRequest,
  ): Promise<SubmissionReceipt> {
    const upload = await this.readUpload(req);
    const csv = upload.files.get(CSV_FILE_FIELD);
    if (csv === undefined) {
      throw new UnprocessableEntityException(
        `A CSV file is required in the '${CSV_FILE_FIELD}' field`,
      );
    }
    const dto = await this.validateFields(formBody(upload.fields), SubmitCsvFieldsDto);

    const { idColumn, ...options } = dto;
    this.logger.debug(`CSV upload from ${caller.id} (${csv.length} chars)`);
    return this.banCheckService.submitCsv(
      caller,
      csv,
      idColumn,
      options,
      upload.files.get(PROXY_FILE_FIELD),
    );
  }

  @Get('tasks/:taskId')
  @UseGuards(PollingThrottleGuard)
  getTask(
    @CurrentCaller() caller: Caller,
    @Param('taskId') taskId: string,
  ): Promise<BanCheckTask> {
    return this.banCheckService.getTask(caller, taskId);
  }

  @Get('tasks')
  listTasks(
    @CurrentCaller() caller: Caller,
    @Query() query: ListTasksQueryDto,
  ): Promise<TaskPage> {
    return this.banCheckService.listTasks(caller, query);
  }

  private async readUpload(req: FastifyRequest): Promise<MultipartUpload> {
    if (!req.isMultipart()) {
      throw new UnprocessableEntityException('Expected a multipart/form-data upload');
    }
    return readMultipartUpload(req);
  }

  private async validateFields<T extends object>(
    body: Record<string, string | string[]>,
    metatype: new () => T,
  ): Promise<T> {
    const dto: unknown = await this.fieldsPipe.transform(body, { type: 'body', metatype });
    if (!(dto instanceof metatype)) {
      throw new UnprocessableEntityException('Invalid form fields');
    }
    return dto;
  }
}
