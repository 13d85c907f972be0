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

// Complex subsystem classes
export class DVDPlayer {
	constructor(private readonly out: Narrate) {}

	on(): void {
		this.out("DVD Player is ON.");
	}

	play(movie: string): void {
		this.out(`Playing movie: ${movie}`);
	}

	off(): void {
		this.out("DVD Player is OFF.");
	}
}

export class SoundSystem {
	constructor(private readonly out: Narrate) {}

	on(): void {
		this.out("Sound System is ON.");
	}

	setVolume(level: number): void {
		this.out(`Setting volume to ${level}.`);
	}

	off(): void {
		this.out("Sound System is OFF.");
	}
}

export class Projector {
	constructor(private readonly out: Narrate) {}

	on(): void {
		this.out("Projector is ON.");
	}

	setInput(source: string): void {
		this.out(`Setting projector input to ${source}.`);
	}

	off(): void {
		this.out("Projector is OFF.");
	}
}

// Facade
export class HomeTheaterFacade {
	constructor(
		private readonly dvdPlayer: DVDPlayer,
		private readonly soundSystem: SoundSystem,
		private readonly projector: Projector,
		private readonly out: Narrate,
	) {}

	watchMovie(movie: string): void {
		this.out(`Preparing to watch movie: ${movie}`);
		this.projector.on();
		this.projector.setInput("DVD");
		this.soundSystem.on();
		this.soundSystem.setVolume(20);
		this.dvdPlayer.on();
		this.dvdPlayer.play(movie);
		this.out("Enjoy your movie!");
	}

	endMovie(): void {
		this.out("Shutting down the home theater.");
		this.dvdPlayer.off();
		this.soundSystem.off();
		this.projector.off();
	}
}

export function runFacadeDemo(out: Narrate = consoleNarrator): void {
	const homeTheater = new HomeTheaterFacade(
		new DVDPlayer(out),
		new SoundSystem(out),
		new Projector(out),
		out,
	);

	homeTheater.watchMovie("Inception");
	homeTheater.endMovie();
}

export const facadeDemo: DemoDefinition = {
	name: "facade",
	title: "Facade",
	category: "structural",
	summary:
		"Offers one simple entry point in front of a set of complicated subsystems. A waiter takes " +
		"your order and deals with the kitchen and billing so you do not have to.",
	participants: [
		"DVDPlayer, SoundSystem, Projector: the subsystems",
		"HomeTheaterFacade: watchMovie() and endMovie() run the fixed sequences",
	],
	run: runFacadeDemo,
};

if (require.main === module) {
	runFacadeDemo();
}
