import { Type } from 'class-transformer';
import {
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { BreachSummaryInput } from '../summary.prompt';

export class BreachDataDto implements BreachSummaryInput {
  @IsString()
  @IsNotEmpty()
  source!: string;

  @IsOptional()
  @IsString()
  date?: string | null;

  @IsOptional()
  @IsString()
  risk_level?: string | null;

  @IsOptional()
  @IsString()
  description?: string | null;
}

export class SummarizeBreachDto {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => BreachDataDto)
  breach_data?: BreachDataDto[];
}
