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

import { describe, expect, it } from "vitest";
import { AudioPlayer, MediaAdapter, adapterDemo } from "./adapter";
import { createTranscript } from "./narration";

describe("MediaAdapter", () => {
	it("should bridge vlc and mp4 to the advanced player", () => {
		const transcript = createTranscript();
		new MediaAdapter("vlc", transcript.narrate).play("vlc", "a.vlc");
		new MediaAdapter("mp4", transcript.narrate).play("mp4", "b.mp4");

		expect(transcript.lines).toEqual(["Playing VLC file: a.vlc", "Playing MP4 file: b.mp4"]);
	});

	it("should report an unrecognized format instead of throwing", () => {
		const transcript = createTranscript();
		const adapter = new MediaAdapter("flac", transcript.narrate);

		expect(() => adapter.play("flac", "c.flac")).not.toThrow();
		expect(transcript.lines).toEqual(["Unsupported format: flac"]);
	});

	it("should report a format it was not built for", () => {
		const transcript = createTranscript();
		new MediaAdapter("vlc", transcript.narrate).play("wav", "d.wav");

		expect(transcript.lines).toEqual(["Unsupported format: wav"]);
	});
});

describe("AudioPlayer", () => {
	it("should play mp3 natively", () => {
		const transcript = createTranscript();
		new AudioPlayer(transcript.narrate).play("mp3", "e.mp3");

		expect(transcript.lines).toEqual(["Playing MP3 file: e.mp3"]);
	});

	it("should narrate the demo sequence", () => {
		const transcript = createTranscript();
		adapterDemo.run(transcript.narrate);

		expect(transcript.lines).toEqual([
			"Playing MP3 file: song.mp3",
			"Playing MP4 file: movie.mp4",
			"Playing VLC file: video.vlc",
			"Unsupported format: avi",
		]);
	});
});
