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

export interface Image {
	display(): void;
}

// Real subject
export class RealImage implements Image {
	constructor(
		private readonly fileName: string,
		private readonly out: Narrate,
	) {
		this.loadFromDisk();
	}

	private loadFromDisk(): void {
		this.out(`Loading image from disk: ${this.fileName}`);
	}

	display(): void {
		this.out(`Displaying image: ${this.fileName}`);
	}
}

// Virtual proxy
export class ProxyImage implements Image {
	private realImage: RealImage | null = null;

	constructor(
		private readonly fileName: string,
		private readonly out: Narrate,
	) {}

	get isLoaded(): boolean {
		return this.realImage !== null;
	}

	display(): void {
		if (this.realImage === null) {
			this.realImage = new RealImage(this.fileName, this.out);
		}
		this.realImage.display();
	}
}

export function runProxyDemo(out: Narrate = consoleNarrator): void {
	const proxyImage = new ProxyImage("test_image.jpg", out);

	out("Image is not yet loaded.");
	proxyImage.display();
	proxyImage.display();
}

export const proxyDemo: DemoDefinition = {
	name: "proxy",
	title: "Proxy",
	category: "structural",
	summary:
		"Puts a stand-in in front of a real object to control access to it, with the same interface. " +
		"A celebrity's assistant handles requests and only bothers the celebrity when needed. Here " +
		"the proxy delays loading an image until the first time it is displayed.",
	participants: [
		"Image: the shared interface",
		"RealImage: expensive to create",
		"ProxyImage: creates the real image lazily and reuses it",
	],
	run: runProxyDemo,
};

if (require.main === module) {
	runProxyDemo();
}
