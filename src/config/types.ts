import type { PacerConfig } from "./schema.js";

export type { PacerConfig };
export type ServerConfig = PacerConfig["server"];
export type LoggingConfig = PacerConfig["logging"];
export type DetectionConfig = PacerConfig["detection"];
export type FrequencyConfig = PacerConfig["frequency"];
export type PreferenceDefaults = FrequencyConfig["defaults"];
export type Recurrence = FrequencyConfig["typeRecurrence"][string];
export type SynthesisConfig = PacerConfig["synthesis"];
export type DeliveryConfig = PacerConfig["delivery"];
export type WebhookSinkConfig = NonNullable<DeliveryConfig["webhooks"]["push"]>;
export type ConnectionsConfig = PacerConfig["connections"];
export type IntegrationsConfig = PacerConfig["integrations"];
