import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { DayAheadServicesModule } from "./dayahead-services.module";
import { TrpcModule } from "./trpc/trpc.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env", "../.env", "../../.env"],
      cache: true,
    }),
    DayAheadServicesModule,
    TrpcModule,
  ],
})
export class AppModule {
}
