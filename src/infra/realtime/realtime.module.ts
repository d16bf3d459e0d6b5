import type { Container } from "inversify";

import { REALTIME_TYPES } from "./realtime.types";
import type { HubSettings } from "./realtime.settings";
import { RoomDirectory } from "./roomDirectory";

export function registerRealtimeModule(container: Container, settings: HubSettings) {
  container.bind<HubSettings>(REALTIME_TYPES.HubSettings).toConstantValue(settings);

  container
	.bind<RoomDirectory>(REALTIME_TYPES.RoomDirectory)
	.to(RoomDirectory)
	.inSingletonScope();
}
