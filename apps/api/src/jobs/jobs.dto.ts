import { Transform } from "class-transformer";
import { IsInt, IsOptional, IsString, Matches, Min } from "class-validator";

// Ids name a directory under JOBS_DIR, so no separators and no leading dot.
const JOB_ID_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

export class StartProofDto {
  @Matches(JOB_ID_PATTERN, {
    message: "proof_uuid must contain only letters, digits, '.', '_' or '-'"
  })
  proof_uuid!: string;
}

export class LogsQueryDto {
  @IsOptional()
  @IsString()
  proof_uuid?: string;

  @IsOptional()
  @Transform(({ value }) => (value === undefined || value === "" ? undefined : Number(value)))
  @IsInt()
  @Min(0)
  n?: number;
}
