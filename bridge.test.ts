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
import { AdvancedRemoteControl, RemoteControl, SamsungTV, SonyTV, bridgeDemo } from "./bridge";
import { createTranscript } from "./narration";

describe("Bridge", () => {
	it("should let a basic remote drive any TV", () => {
		const transcript = createTranscript();
		const remote = new RemoteControl(new SamsungTV(transcript.narrate));
		remote.turnOn();
		remote.setChannel(42);

		expect(transcript.lines).toEqual(["Samsung TV is ON", "Samsung TV set to channel 42"]);
	});

	it("should let the advanced remote jump to the favourite channel", () => {
		const transcript = createTranscript();
		const remote = new AdvancedRemoteControl(new SonyTV(transcript.narrate), transcript.narrate);
		remote.setFavoriteChannel();

		expect(transcript.lines).toEqual(["Setting to favorite channel: 10", "Sony TV set to channel 10"]);
	});

	it("should narrate the demo sequence", () => {
		const transcript = createTranscript();
		bridgeDemo.run(transcript.narrate);

		expect(transcript.lines).toEqual([
			"Sony TV is ON",
			"Sony TV set to channel 5",
			"Sony TV is OFF",
			"Samsung TV is ON",
			"Setting to favorite channel: 10",
			"Samsung TV set to channel 10",
			"Samsung TV is OFF",
		]);
	});
});
