import { Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { CheckOptionsDto } from './check-options.dto';

export class SubmitSteamIdsDto {
  @IsArray()
  @IsString({ each: true })
  steamIds!: string[];

  @IsOptional()
  @ValidateNested()
  @Type(() => CheckOptionsDto)
  options?: CheckOptionsDto;
}

// Each form value may carry several ids separated by whitespace or commas.
const splitIdentifiers = ({ value }: { value: unknown }): unknown => {
  const values = typeof value === 'string' ? [value] : value;
  if (!Array.isArray(values)) return value;
  return values.flatMap((entry) =>
    typeof entry === 'string' ? entry.split(/[\s,]+/).filter(Boolean) : [entry],
  );
};

/** Text fields of the multipart identifier upload. */
export class SubmitSteamIdsFormDto extends CheckOptionsDto {
  @Transform(splitIdentifiers)
  @IsArray()
  @IsString({ each: true })
  steamIds!: string[];
}
