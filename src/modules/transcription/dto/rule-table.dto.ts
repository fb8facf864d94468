import { Type } from 'class-transformer';
import { IsArray, IsDefined, IsInt, IsOptional, IsString, ValidateNested } from 'class-validator';

export class RuleDefinitionDto {
  @IsString()
  @IsOptional()
  context?: string;

  @IsString()
  pattern!: string;

  // строка или массив строк (альтернативы по вариантам)
  @IsDefined()
  @IsString({ each: true })
  output!: string | string[];

  // > 0 и ≤ остатка проверяет движок в момент применения
  @IsInt()
  @IsOptional()
  consume?: number;
}

export class RuleTableFileDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RuleDefinitionDto)
  rules!: RuleDefinitionDto[];
}
