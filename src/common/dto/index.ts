import { IsArray, IsBoolean, IsOptional, IsString, ValidateNested } from 'class-validator';
import { Transform, TransformFnParams, Type } from 'class-transformer';

// Les champs multipart arrivent en texte: "true" / "false", listes "a,b,c"
function toBoolean({ value }: TransformFnParams): unknown {
  if (value === 'true' || value === true) return true;
  if (value === 'false' || value === false) return false;
  return value;
}

function toList({ value }: TransformFnParams): unknown {
  if (typeof value !== 'string') return value;
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export class NormalizationOptionsDto {
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  strictHeaders?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  mergeAlternates?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  dropZeroQuantity?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  cleanupDesignators?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  splitManufacturers?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  splitQuantities?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  normalizeTaxonomy?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  validate?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  stripPartNumbers?: boolean;

  @IsOptional()
  @Transform(toList)
  @IsArray()
  @IsString({ each: true })
  splitExemptTypes?: string[];

  @IsOptional()
  @Transform(toList)
  @IsArray()
  @IsString({ each: true })
  excludeDescriptionTerms?: string[];

  @IsOptional()
  @Transform(toList)
  @IsArray()
  @IsString({ each: true })
  excludeComponentTypes?: string[];
}

/**
 * Corps JSON de POST /api/bom/normalize.
 * Les lignes sont validées par le schéma Zod CanonicalRecordSchema dans le contrôleur.
 */
export class NormalizeRecordsDto {
  @IsArray()
  records!: unknown[];

  @IsOptional()
  @IsString()
  sheetName?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => NormalizationOptionsDto)
  options?: NormalizationOptionsDto;
}
