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

import { Logger } from "./logger";
import { type DemoDefinition, type Narrate, consoleNarrator } from "./narration";

const logger = Logger.getLogger("adapter");

// Target interface
export interface MediaPlayer {
	play(audioType: string, fileName: string): void;
}

// Adaptee with an incompatible interface
export class AdvancedMediaPlayer {
	constructor(private readonly out: Narrate) {}

	playVlc(fileName: string): void {
		this.out(`Playing VLC file: ${fileName}`);
	}

	playMp4(fileName: string): void {
		this.out(`Playing MP4 file: ${fileName}`);
	}
}

const ADAPTED_FORMATS = ["vlc", "mp4"] as const;
type AdaptedFormat = (typeof ADAPTED_FORMATS)[number];

const isAdaptedFormat = (audioType: string): audioType is AdaptedFormat =>
	ADAPTED_FORMATS.some((format) => format === audioType);

function reportUnsupported(out: Narrate, audioType: string, fileName: string): void {
	logger.info("Unsupported format requested", { audioType, fileName });
	out(`Unsupported format: ${audioType}`);
}

export class MediaAdapter implements MediaPlayer {
	private readonly advancedPlayer: AdvancedMediaPlayer | undefined;

	constructor(
		audioType: string,
		private readonly out: Narrate,
	) {
		this.advancedPlayer = isAdaptedFormat(audioType) ? new AdvancedMediaPlayer(out) : undefined;
	}

	/** Unknown formats are reported, never thrown. */
	play(audioType: string, fileName: string): void {
		if (!this.advancedPlayer || !isAdaptedFormat(audioType)) {
			reportUnsupported(this.out, audioType, fileName);
			return;
		}
		switch (audioType) {
			case "vlc":
				this.advancedPlayer.playVlc(fileName);
				break;
			case "mp4":
				this.advancedPlayer.playMp4(fileName);
				break;
		}
	}
}

export class AudioPlayer implements MediaPlayer {
	constructor(private readonly out: Narrate) {}

	play(audioType: string, fileName: string): void {
		if (audioType === "mp3") {
			this.out(`Playing MP3 file: ${fileName}`);
		} else if (isAdaptedFormat(audioType)) {
			new MediaAdapter(audioType, this.out).play(audioType, fileName);
		} else {
			reportUnsupported(this.out, audioType, fileName);
		}
	}
}

export function runAdapterDemo(out: Narrate = consoleNarrator): void {
	const player = new AudioPlayer(out);

	player.play("mp3", "song.mp3");
	player.play("mp4", "movie.mp4");
	player.play("vlc", "video.vlc");
	player.play("avi", "clip.avi");
}

export const adapterDemo: DemoDefinition = {
	name: "adapter",
	title: "Adapter",
	category: "structural",
	summary:
		"Translates one interface into another that a client expects, so incompatible classes can " +
		"work together. A travel plug adapter lets a foreign device use the local socket. Formats " +
		"the adapter cannot bridge are reported and skipped rather than raised.",
	participants: [
		"MediaPlayer: the target interface",
		"AdvancedMediaPlayer: the adaptee",
		"MediaAdapter: translates play() into playVlc()/playMp4()",
		"AudioPlayer: the client-facing player",
	],
	run: runAdapterDemo,
};

if (require.main === module) {
	runAdapterDemo();
}
