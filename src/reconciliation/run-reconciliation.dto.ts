import { IsOptional, IsString, Matches } from 'class-validator';

export class RunReconciliationDto {
  @IsOptional()
  @IsString()
  @Matches(/^[\w-]+(\s*,\s*[\w-]+)*$/, {
    message: 'locationIds must be a comma-separated list of ids',
  })
  locationIds?: string;
}
