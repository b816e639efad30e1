import { IsOptional, IsString, MaxLength } from "class-validator";

export class ListMediaQueryDto {
  @IsOptional()
  @IsString()
  @MaxLength(50)
  category?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  q?: string;
}
