import { Transform } from "class-transformer";
import { IsOptional, IsString, MaxLength } from "class-validator";

// Blank values mean "leave unchanged".
const blankToUndefined = ({ value }: { value: unknown }) => {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
};

export class UpdateMediaDto {
  @IsOptional()
  @Transform(blankToUndefined)
  @IsString()
  @MaxLength(255)
  title?: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @IsString()
  @MaxLength(50)
  category?: string;
}
