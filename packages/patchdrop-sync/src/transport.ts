export type Unsubscribe = () => void;

export interface DuplexTransport<M> {
  send(msg: M): Promise<void>;
  onMessage(handler: (msg: M) => void): Unsubscribe;
}

export type WireCodec<Message, Wire> = {
  encode(message: Message): Wire;
  decode(wire: Wire): Message;
};

/**
 * Frames that fail to decode are passed to `onDecodeError` and dropped. Without
 * a callback the decode error is thrown from the underlying transport's handler.
 */
export function wrapDuplexTransportWithCodec<Wire, Message>(
  transport: DuplexTransport<Wire>,
  codec: WireCodec<Message, Wire>,
  opts: { onDecodeError?: (err: unknown) => void } = {}
): DuplexTransport<Message> {
  return {
    send: async (msg) => transport.send(codec.encode(msg)),
    onMessage: (handler) =>
      transport.onMessage((wire) => {
        let msg: Message;
        try {
          msg = codec.decode(wire);
        } catch (err) {
          if (!opts.onDecodeError) throw err;
          opts.onDecodeError(err);
          return;
        }
        handler(msg);
      }),
  };
}

export function createInMemoryDuplex<M>(): [DuplexTransport<M>, DuplexTransport<M>] {
  const aHandlers = new Set<(msg: M) => void>();
  const bHandlers = new Set<(msg: M) => void>();

  const end = (own: Set<(msg: M) => void>, peer: Set<(msg: M) => void>): DuplexTransport<M> => ({
    async send(msg) {
      queueMicrotask(() => {
        for (const h of peer) h(msg);
      });
    },
    onMessage(handler) {
      own.add(handler);
      return () => own.delete(handler);
    },
  });

  return [end(aHandlers, bHandlers), end(bHandlers, aHandlers)];
}
