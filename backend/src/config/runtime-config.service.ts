import { Injectable } from "@nestjs/common";

import type { ConfigDocument } from "./schemas";
import { getRuntimeConfig } from "./runtime-config";

@Injectable()
export class RuntimeConfigService {
  private readonly document: ConfigDocument;

  constructor() {
    const config = getRuntimeConfig();
    if (!config) {
      throw new Error("Runtime configuration not initialised");
    }
    this.document = config;
  }

  getDocumentRef(): ConfigDocument {
    return this.document;
  }

  get deliveryAreas(): string[] {
    return [...this.document.delivery_areas];
  }

  get currency(): string {
    return this.document.currency;
  }
}
