import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  NotFoundException,
  Param,
  Post,
  Query,
  Res
} from "@nestjs/common";
import type { Response } from "express";
import type { ErrorResponse } from "@blockprover/shared";
import { InvocationError } from "../common/errors";
import { JobsService } from "./jobs.service";
import { LogsQueryDto, StartProofDto } from "./jobs.dto";

const JOB_NOT_FOUND: ErrorResponse = { error: "job not found" };

@Controller()
export class JobsController {
  constructor(private readonly jobs: JobsService) {}

  @Post("start_proof")
  @HttpCode(HttpStatus.ACCEPTED)
  async startProof(@Body() body: StartProofDto, @Res({ passthrough: true }) res: Response) {
    try {
      const { started, body: payload } = await this.jobs.startProof(body.proof_uuid);
      if (!started) {
        res.status(HttpStatus.OK);
      }
      return payload;
    } catch (error) {
      if (error instanceof InvocationError) {
        throw new InternalServerErrorException({ error: error.message });
      }
      throw error;
    }
  }

  @Get("proof_state/:proofUuid")
  async getProofState(@Param("proofUuid") proofUuid: string) {
    const state = await this.jobs.getProofState(proofUuid);
    if (!state) {
      throw new NotFoundException(JOB_NOT_FOUND);
    }
    return state;
  }

  @Get("logs")
  async getLogs(@Query() query: LogsQueryDto) {
    const logs = query.proof_uuid ? await this.jobs.getLogs(query.proof_uuid, query.n) : null;
    if (!logs) {
      throw new NotFoundException(JOB_NOT_FOUND);
    }
    return logs;
  }
}
