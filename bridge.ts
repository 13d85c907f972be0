/**
 * Copyright 2025 Mike Odnis
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { type DemoDefinition, type Narrate, consoleNarrator } from "./narration";

// Implementor
export interface TV {
	on(): void;
	off(): void;
	setChannel(channel: number): void;
}

abstract class BrandTV implements TV {
	protected abstract readonly brand: string;

	constructor(private readonly out: Narrate) {}

	on(): void {
		this.out(`${this.brand} TV is ON`);
	}

	off(): void {
		this.out(`${this.brand} TV is OFF`);
	}

	setChannel(channel: number): void {
		this.out(`${this.brand} TV set to channel ${channel}`);
	}
}

export class SonyTV extends BrandTV {
	protected readonly brand = "Sony";
}

export class SamsungTV extends BrandTV {
	protected readonly brand = "Samsung";
}

// Abstraction
export class RemoteControl {
	constructor(protected readonly tv: TV) {}

	turnOn(): void {
		this.tv.on();
	}

	turnOff(): void {
		this.tv.off();
	}

	setChannel(channel: number): void {
		this.tv.setChannel(channel);
	}
}

export const FAVORITE_CHANNEL = 10;

// Refined abstraction
export class AdvancedRemoteControl extends RemoteControl {
	constructor(
		tv: TV,
		private readonly out: Narrate,
	) {
		super(tv);
	}

	setFavoriteChannel(): void {
		this.out(`Setting to favorite channel: ${FAVORITE_CHANNEL}`);
		this.tv.setChannel(FAVORITE_CHANNEL);
	}
}

export function runBridgeDemo(out: Narrate = consoleNarrator): void {
	const basicRemote = new RemoteControl(new SonyTV(out));
	basicRemote.turnOn();
	basicRemote.setChannel(5);
	basicRemote.turnOff();

	const advancedRemote = new AdvancedRemoteControl(new SamsungTV(out), out);
	advancedRemote.turnOn();
	advancedRemote.setFavoriteChannel();
	advancedRemote.turnOff();
}

export const bridgeDemo: DemoDefinition = {
	name: "bridge",
	title: "Bridge",
	category: "structural",
	summary:
		"Splits an abstraction from its implementation so the two can vary independently. " +
		"Remote controls and TVs evolve separately: any remote works with any brand of TV " +
		"because the remote only talks to the TV interface.",
	participants: [
		"RemoteControl: the abstraction, holds a TV",
		"AdvancedRemoteControl: refined abstraction with a favourite channel",
		"TV: the implementor interface",
		"SonyTV, SamsungTV: concrete implementors",
	],
	run: runBridgeDemo,
};

if (require.main === module) {
	runBridgeDemo();
}
