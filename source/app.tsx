import { Box, Static, Text, useApp, useInput } from "ink";
import { useEffect, useMemo, useState } from "react";
import { ChannelEmitter } from "./core/channel.js";
import { describeError } from "./core/errors.js";
import type { DownloadOrchestrator } from "./core/orchestrator.js";
import {
	COMPLETE_STATUS,
	ERROR_STATUS,
	READY_STATUS,
	statusForProgress,
} from "./core/status.js";
import type { ChannelEvents, DownloadRequest } from "./core/types.js";

type Props = {
	orchestrator: DownloadOrchestrator;
	request: DownloadRequest;
};

type Phase = "running" | "completed" | "failed";

type LogLine = {
	id: string;
	color: "white" | "yellow" | "red" | "green";
	message: string;
};

const SPINNER_FRAMES = ["-", "\\", "|", "/"] as const;

export default function App({ orchestrator, request }: Props) {
	const { exit } = useApp();
	const channel = useMemo(() => new ChannelEmitter(), []);
	const [phase, setPhase] = useState<Phase>("running");
	const [status, setStatus] = useState(READY_STATUS);
	const [logs, setLogs] = useState<LogLine[]>([]);
	const [savedTo, setSavedTo] = useState<string | undefined>();
	const [tick, setTick] = useState(0);

	useInput((input, key) => {
		if (input === "q" || key.escape || (key.ctrl && input === "c")) {
			process.exitCode = 130;
			exit();
		}
	});

	useEffect(() => {
		const spinnerInterval = setInterval(
			() => setTick((value) => value + 1),
			120,
		);
		return () => clearInterval(spinnerInterval);
	}, []);

	useEffect(() => {
		const pushLog = (color: LogLine["color"], message: string) => {
			setLogs((prev) => [
				...prev,
				{ id: `${prev.length}`, color, message },
			]);
		};

		const onLog = ({ message }: ChannelEvents["log"]) => {
			pushLog(colorFor(message), message);
		};
		const onProgress = ({ event }: ChannelEvents["progress"]) => {
			const next = statusForProgress(event);
			if (next) {
				setStatus(next);
			}
		};
		const onComplete = () => {
			setPhase("completed");
			setStatus(COMPLETE_STATUS);
		};
		const onFailed = ({ message }: ChannelEvents["failed"]) => {
			setPhase("failed");
			setStatus(ERROR_STATUS);
			pushLog("red", `Error: ${message}`);
		};

		channel.on("log", onLog);
		channel.on("progress", onProgress);
		channel.on("complete", onComplete);
		channel.on("failed", onFailed);

		setStatus("Downloading...");
		try {
			const handle = orchestrator.submit(request, channel.asChannel());
			void handle.outcome
				.then((outcome) => {
					if (outcome.status === "success") {
						setSavedTo(outcome.filePath);
					} else {
						process.exitCode = 1;
					}
				})
				.catch((error: unknown) => {
					process.exitCode = 1;
					onFailed({ message: describeError(error) });
				})
				.finally(() => {
					exit();
				});
		} catch (error) {
			process.exitCode = 1;
			onFailed({ message: describeError(error) });
			exit();
		}

		return () => {
			channel.off("log", onLog);
			channel.off("progress", onProgress);
			channel.off("complete", onComplete);
			channel.off("failed", onFailed);
		};
	}, [channel, orchestrator, request, exit]);

	const spinner = SPINNER_FRAMES[tick % SPINNER_FRAMES.length] ?? "-";
	const statusColor =
		phase === "failed" ? "red" : phase === "completed" ? "green" : "cyan";

	return (
		<Box flexDirection="column" width="100%">
			<Static items={logs}>
				{(log) => (
					<Text key={log.id} color={log.color}>
						{log.message}
					</Text>
				)}
			</Static>

			<Box
				borderStyle="round"
				borderColor={statusColor}
				flexDirection="column"
				paddingX={1}
			>
				<Box justifyContent="space-between">
					<Text color="cyan" bold>
						clipdrop
					</Text>
					<Text color="gray">q/esc quit</Text>
				</Box>
				<Text color="gray">
					{request.format} | {request.outputDir}
				</Text>
				<Text color="gray" wrap="truncate-end">
					{request.url}
				</Text>
				<Box marginTop={1}>
					<Text color={statusColor} bold>
						{phase === "running" ? `${spinner} ` : ""}
						{status}
					</Text>
				</Box>
				{savedTo ? <Text color="green">Saved to {savedTo}</Text> : null}
			</Box>
		</Box>
	);
}

function colorFor(message: string): LogLine["color"] {
	if (message.startsWith("Error: ")) {
		return "red";
	}
	if (message.startsWith("Warning: ")) {
		return "yellow";
	}
	if (
		message.startsWith("Download finished: ") ||
		message.startsWith("Converted to mp4: ")
	) {
		return "green";
	}
	return "white";
}
