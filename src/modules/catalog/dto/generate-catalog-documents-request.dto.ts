import {
  ArrayMaxSize,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

export class GenerateCatalogDocumentsRequestDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(120)
  category!: string;

  // Missing and empty both reach the use case, which answers with the "select a size" message.
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(40)
  @IsString({ each: true })
  @MaxLength(40, { each: true })
  sizes?: string[];
}
