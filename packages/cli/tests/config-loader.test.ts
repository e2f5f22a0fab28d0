import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigProvider, Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	ConfigLoadError,
	ConfigValidationError,
	loadConfig,
} from "../src/config/loader.js";

describe("loadConfig", () => {
	let tempRoot: string;

	const writeConfig = (name: string, content: string): string => {
		const fullPath = path.join(tempRoot, name);
		fs.mkdirSync(path.dirname(fullPath), { recursive: true });
		fs.writeFileSync(fullPath, content);
		return fullPath;
	};

	/** Runs with an empty environment unless one is given. */
	const load = (
		configPath: string,
		env: ReadonlyArray<readonly [string, string]> = [],
	) =>
		Effect.runPromise(
			Effect.either(
				loadConfig(configPath, tempRoot).pipe(
					Effect.withConfigProvider(ConfigProvider.fromMap(new Map(env))),
				),
			),
		);

	beforeEach(() => {
		tempRoot = fs.mkdtempSync(path.join(os.tmpdir(), "civic-ledger-loader-"));
	});

	afterEach(() => {
		fs.rmSync(tempRoot, { recursive: true, force: true });
	});

	it("resolves paths against the config file and applies defaults", async () => {
		const configPath = writeConfig(
			"project/civic-ledger.config.json",
			JSON.stringify({ migrationsDir: "migrations", storageRoot: "../data" }),
		);

		const result = await load(configPath);

		expect(result._tag === "Right" ? result.right : undefined).toEqual({
			configPath,
			migrationsDir: path.join(tempRoot, "project", "migrations"),
			storageRoot: path.join(tempRoot, "data"),
			stateTracking: "git",
			entryScripts: ["migrate.ts", "run.ts"],
			ledgerDir: "migration-logs",
		});
	});

	it("keeps explicit optional settings", async () => {
		const configPath = writeConfig(
			"civic-ledger.config.json",
			JSON.stringify({
				migrationsDir: "/srv/migrations",
				storageRoot: "/srv/data",
				stateTracking: "none",
				entryScripts: ["index.ts"],
				ledgerDir: "applied",
			}),
		);

		const result = await load(configPath);

		expect(result._tag === "Right" ? result.right : undefined).toEqual({
			configPath,
			migrationsDir: "/srv/migrations",
			storageRoot: "/srv/data",
			stateTracking: "none",
			entryScripts: ["index.ts"],
			ledgerDir: "applied",
		});
	});

	it("lets the environment override the storage root", async () => {
		const configPath = writeConfig(
			"civic-ledger.config.json",
			JSON.stringify({ migrationsDir: "migrations", storageRoot: "data" }),
		);

		const result = await load(configPath, [
			["CIVIC_LEDGER_STORAGE_ROOT", "override/data"],
		]);

		expect(result._tag === "Right" ? result.right.storageRoot : undefined).toBe(
			path.join(tempRoot, "override", "data"),
		);
	});

	it("rejects a config missing a required field", async () => {
		const configPath = writeConfig(
			"civic-ledger.config.json",
			JSON.stringify({ migrationsDir: "migrations" }),
		);

		const result = await load(configPath);

		expect(result._tag).toBe("Left");
		if (result._tag === "Left") {
			expect(result.left).toBeInstanceOf(ConfigValidationError);
			expect(result.left.message.startsWith(`Invalid config in ${configPath}:`)).toBe(true);
		}
	});

	it("rejects an unknown state tracking mode", async () => {
		const configPath = writeConfig(
			"civic-ledger.config.json",
			JSON.stringify({
				migrationsDir: "m",
				storageRoot: "d",
				stateTracking: "svn",
			}),
		);

		const result = await load(configPath);

		expect(result._tag === "Left" ? result.left._tag : undefined).toBe(
			"ConfigValidationError",
		);
	});

	it("reports malformed JSON as a load error", async () => {
		const configPath = writeConfig("civic-ledger.config.json", "{ nope");

		const result = await load(configPath);

		expect(result._tag).toBe("Left");
		if (result._tag === "Left") {
			expect(result.left).toBeInstanceOf(ConfigLoadError);
			expect(result.left.reason.startsWith("Failed to parse JSON config:")).toBe(true);
		}
	});

	it("rejects unsupported extensions", async () => {
		const configPath = writeConfig("civic-ledger.config.toml", "");

		const result = await load(configPath);

		expect(result._tag === "Left" ? result.left.message : undefined).toBe(
			`Cannot load config from ${configPath}: Unsupported extension '.toml'. Use .ts, .js, or .json`,
		);
	});

	it("loads the default export of a JavaScript config", async () => {
		writeConfig("package.json", '{ "type": "module" }\n');
		const configPath = writeConfig(
			"civic-ledger.config.js",
			'export default { migrationsDir: "migrations", storageRoot: "data", stateTracking: "none" };\n',
		);

		const result = await load(configPath);

		expect(result._tag === "Right" ? result.right.stateTracking : undefined).toBe("none");
	});
});
