/** Receives the response chosen for each message. */
export interface OutputSink {
  deliver(text: string): void;
}

/** A sink that records deliveries in order. */
export interface ArraySink extends OutputSink {
  readonly messages: ReadonlyArray<string>;
}

export function arraySink(): ArraySink {
  const messages: string[] = [];
  return {
    messages,
    deliver(text) {
      messages.push(text);
    },
  };
}

/** Forward every response to `write`. */
export function writerSink(write: (text: string) => void): OutputSink {
  return { deliver: write };
}
