import { Transform } from "class-transformer";
import { IsInt, Min } from "class-validator";

export class MediaIdParamsDto {
  @Transform(({ value }) => (/^\d+$/.test(String(value)) ? Number(value) : value))
  @IsInt()
  @Min(1)
  id!: number;
}
