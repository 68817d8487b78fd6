import { Module } from "@nestjs/common";

import { ConfigManagementModule } from "./modules/config-management/config-management.module";
import { DomainsModule } from "./modules/domains/domains.module";

@Module({
  imports: [ConfigManagementModule, DomainsModule],
  controllers: [],
  providers: [],
})
export class AppModule {}
