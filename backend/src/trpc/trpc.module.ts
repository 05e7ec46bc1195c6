import { Module } from "@nestjs/common";

import { TrpcRouter } from "./trpc.router";
import { DayAheadServicesModule } from "../dayahead-services.module";

@Module({
  imports: [DayAheadServicesModule],
  providers: [TrpcRouter],
  exports: [TrpcRouter],
})
export class TrpcModule {
}
