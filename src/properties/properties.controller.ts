import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  UseInterceptors,
} from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { PropertiesService } from "./properties.service";
import {
  IngestPropertiesDto,
  IngestPropertiesResponseDto,
} from "./dto/ingest-properties.dto";
import {
  PropertyResponseDto,
  ReclassifyPropertyResponseDto,
} from "./dto/property-response.dto";
import { PropertyQueryDto } from "./dto/property-query.dto";
import { ReclassifyPropertyDto } from "./dto/reclassify-property.dto";
import { NoCdnCacheInterceptor } from "../common/interceptors/no-cdn-cache.interceptor";

/**
 * Properties Controller
 *
 * Endpoints:
 * - POST /properties/ingest - Upsert and classify property records
 * - GET /properties - List properties
 * - GET /properties/:code - Property details
 * - POST /properties/:code/reclassify - Rerun region classification
 * - POST /properties/:code/deactivate - Stop accepting new batches
 */
@ApiTags("properties")
@Controller("properties")
@UseInterceptors(NoCdnCacheInterceptor)
export class PropertiesController {
  constructor(private readonly propertiesService: PropertiesService) {}

  @Post("ingest")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: "Ingest property records",
    description:
      "Upserts properties by code and classifies their region. Invalid records are skipped and reported individually.",
  })
  @ApiResponse({ status: 200, type: IngestPropertiesResponseDto })
  async ingest(@Body() body: IngestPropertiesDto): Promise<IngestPropertiesResponseDto> {
    const results = await this.propertiesService.ingest(body.records);
    return {
      results,
      ingested: results.filter((r) => r.status === "created" || r.status === "updated")
        .length,
      skipped: results.filter((r) => r.status === "skipped").length,
    };
  }

  @Get()
  @ApiOperation({ summary: "List properties" })
  @ApiResponse({ status: 200, type: [PropertyResponseDto] })
  async list(@Query() query: PropertyQueryDto): Promise<PropertyResponseDto[]> {
    const properties = await this.propertiesService.list(!query.includeInactive);
    return properties.map((p) => PropertyResponseDto.fromEntity(p));
  }

  @Get(":code")
  @ApiOperation({ summary: "Get a property by code" })
  @ApiResponse({ status: 200, type: PropertyResponseDto })
  @ApiResponse({ status: 404, description: "Property not found" })
  async findOne(@Param("code") code: string): Promise<PropertyResponseDto> {
    return PropertyResponseDto.fromEntity(await this.propertiesService.findByCode(code));
  }

  @Post(":code/reclassify")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: "Rerun region classification for a property" })
  @ApiResponse({ status: 200, type: ReclassifyPropertyResponseDto })
  @ApiResponse({ status: 404, description: "Property not found" })
  async reclassify(
    @Param("code") code: string,
    @Body() body: ReclassifyPropertyDto,
  ): Promise<ReclassifyPropertyResponseDto> {
    const { property, rule, changed } = await this.propertiesService.reclassify(code, body);
    return { property: PropertyResponseDto.fromEntity(property), rule, changed };
  }

  @Post(":code/deactivate")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: "Deactivate a property" })
  @ApiResponse({ status: 200, type: PropertyResponseDto })
  @ApiResponse({ status: 404, description: "Property not found" })
  async deactivate(@Param("code") code: string): Promise<PropertyResponseDto> {
    return PropertyResponseDto.fromEntity(await this.propertiesService.deactivate(code));
  }
}
