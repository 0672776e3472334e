import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { Property } from "./entities/property.entity";
import { PropertiesService } from "./properties.service";
import { PropertiesController } from "./properties.controller";
import { RegionClassifier } from "./region-classifier.service";

/**
 * Properties Module
 *
 * Property registry and region classification.
 */
@Module({
  imports: [TypeOrmModule.forFeature([Property])],
  controllers: [PropertiesController],
  providers: [PropertiesService, RegionClassifier],
  exports: [PropertiesService, RegionClassifier],
})
export class PropertiesModule {}
