import { server as sdk } from "capability-session-sdk";
import { StdioServerTransport } from "capability-session-stdio-transport";

import { getServerConfig } from "./lib/config";
import { createConsoleLogger } from "./lib/logger";
import { registerCalculator } from "./lib/calculator";

const main = async (): Promise<void> => {
	const config = getServerConfig();
	const log = createConsoleLogger(config.logLevel);

	const server = new sdk.SimpleServer({
		serverInfo: { name: config.name, version: config.version },
		instructions: "Use the calculate tool for arithmetic on two numbers.",
		logger: log,
		maxConcurrency: config.maxConcurrency
	});

	// --- Tools
	registerCalculator(server);

	// --- Resources
	server.resource(
		{
			uri: "about://server",
			name: "About",
			description: "What this server is",
			mimeType: "text/plain"
		},
		async () => `${config.name} ${config.version}: a calculator served over stdio`
	);

	server.resourceTemplate(
		{
			uriTemplate: "greeting://{name}",
			name: "Greeting",
			description: "A greeting for the given name",
			mimeType: "text/plain"
		},
		async ({ name }) => `Hello, ${name}!`
	);

	// --- Prompts
	server.prompt(
		{
			name: "greeting",
			description: "Ask the model to greet someone",
			arguments: [{ name: "name", description: "Name to greet", required: true }]
		},
		async (args) => [{ role: "user", content: { type: "text", text: `Please greet ${args["name"]} warmly.` } }]
	);

	const transport = new StdioServerTransport({ maxMessageSize: config.maxMessageSize, logger: log });
	const connection = await server.connect(transport);

	log.info("Example server is running on stdio", {
		name: config.name,
		version: config.version,
		sessionId: connection.session.id
	});

	const shutdown = async (signal: string) => {
		log.info(`Shutting down (${signal})`);
		await server.close();
		process.exit(0);
	};

	process.on("SIGINT", () => void shutdown("SIGINT"));
	process.on("SIGTERM", () => void shutdown("SIGTERM"));

	await connection.closed;
	log.info("Input closed, exiting");
};

main().catch((err) => {
	// eslint-disable-next-line no-console
	console.error("Fatal error in example server", err);
	process.exit(1);
});
