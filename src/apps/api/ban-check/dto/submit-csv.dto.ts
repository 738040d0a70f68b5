import { IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { CheckOptionsDto } from './check-options.dto';

/** Text fields of the multipart CSV upload. */
export class SubmitCsvFieldsDto extends CheckOptionsDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  idColumn?: string;
}
