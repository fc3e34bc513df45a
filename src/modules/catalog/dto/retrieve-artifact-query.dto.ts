import { IsOptional, IsString, MaxLength } from 'class-validator';

export class RetrieveArtifactQueryDto {
  @IsOptional()
  @IsString()
  @MaxLength(255)
  filename?: string;
}
