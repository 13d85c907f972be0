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

export interface Command {
	execute(): void;
	undo(): void;
}

// Receiver
export class Light {
	private on: boolean = false;

	constructor(private readonly out: Narrate) {}

	turnOn(): void {
		this.on = true;
		this.out("Light is ON");
	}

	turnOff(): void {
		this.on = false;
		this.out("Light is OFF");
	}

	get isOn(): boolean {
		return this.on;
	}
}

export class LightOnCommand implements Command {
	constructor(private readonly light: Light) {}

	execute(): void {
		this.light.turnOn();
	}

	undo(): void {
		this.light.turnOff();
	}
}

export class LightOffCommand implements Command {
	constructor(private readonly light: Light) {}

	execute(): void {
		this.light.turnOff();
	}

	undo(): void {
		this.light.turnOn();
	}
}

// Invoker
export class RemoteControl {
	private command: Command | null = null;

	constructor(private readonly out: Narrate) {}

	setCommand(command: Command | null): void {
		this.command = command;
	}

	pressButton(): void {
		if (this.command) {
			this.command.execute();
		} else {
			this.out("No command set");
		}
	}

	/** Reverses whatever command is currently on the button. */
	pressUndo(): void {
		if (this.command) {
			this.command.undo();
		} else {
			this.out("No command to undo");
		}
	}
}

export function runCommandDemo(out: Narrate = consoleNarrator): void {
	const livingRoomLight = new Light(out);
	const lightOn = new LightOnCommand(livingRoomLight);
	const lightOff = new LightOffCommand(livingRoomLight);
	const remote = new RemoteControl(out);

	remote.setCommand(lightOn);
	remote.pressButton();
	remote.pressUndo();

	remote.setCommand(lightOff);
	remote.pressButton();
	remote.pressUndo();
}

export const commandDemo: DemoDefinition = {
	name: "command",
	title: "Command",
	category: "behavioral",
	summary:
		"Wraps a request in an object so it can be passed around, queued or undone. " +
		"A remote control button does not know how a light works; it just triggers " +
		"whichever command has been assigned to it.",
	participants: [
		"Command: execute() and undo()",
		"LightOnCommand, LightOffCommand: concrete commands",
		"Light: the receiver that does the work",
		"RemoteControl: the invoker",
	],
	run: runCommandDemo,
};

if (require.main === module) {
	runCommandDemo();
}
