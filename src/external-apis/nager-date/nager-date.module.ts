import { Module } from "@nestjs/common";
import { NagerDateClient } from "./nager-date.client";

/**
 * Nager.Date API Module
 *
 * Provides public holiday data from the free Nager.Date API.
 */
@Module({
  providers: [NagerDateClient],
  exports: [NagerDateClient],
})
export class NagerDateModule {}
