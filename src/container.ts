import "reflect-metadata";
import { Container } from "inversify";

import type { Env } from "./config/env";
import { registerRealtimeModule } from "./infra/realtime/realtime.module";
import { hubSettingsFromEnv } from "./infra/realtime/realtime.settings";

export function createContainer(env: Env): Container {
	const container = new Container();

	registerRealtimeModule(container, hubSettingsFromEnv(env));

	return container;
}
