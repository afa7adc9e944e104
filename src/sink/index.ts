import { HttpSink } from "./httpSink";
import { LocalJsonSink } from "./localJsonSink";
import { RabbitSink } from "./rabbitSink";
import { SqsSink } from "./sqsSink";
import type { Sink } from "./types";

export function createSink(runId: string, outputPath: string, env: NodeJS.ProcessEnv = process.env): Sink {
  const sinkType = (env.SINK_TYPE ?? "local_json").toLowerCase();

  switch (sinkType) {
    case "local_json":
      return new LocalJsonSink(outputPath);
    case "sqs":
      return new SqsSink({ queueUrl: env.SQS_QUEUE_URL, runId });
    case "rabbit":
      return new RabbitSink({ connectionUrl: env.RABBIT_URL, runId });
    case "http":
      return new HttpSink({ endpoint: env.HTTP_SINK_ENDPOINT, token: env.HTTP_SINK_TOKEN, runId });
    default:
      throw new Error(`Unsupported sink type: ${sinkType}`);
  }
}

export * from "./baseSink";
export * from "./httpSink";
export * from "./localJsonSink";
export * from "./rabbitSink";
export * from "./sqsSink";
export * from "./types";
