import { ApiPropertyOptional } from "@nestjs/swagger";
import { IsBoolean, IsOptional } from "class-validator";
import { Transform } from "class-transformer";

export class PropertyQueryDto {
  @ApiPropertyOptional({ description: "Include deactivated properties", default: false })
  @IsOptional()
  @Transform(({ obj }) => {
    const raw: unknown = obj.includeInactive;
    return raw === true || raw === "true" || raw === "1";
  })
  @IsBoolean()
  includeInactive?: boolean;
}
