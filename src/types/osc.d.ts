declare module 'osc' {
  interface OSCArgument {
    type: string;
    value: unknown;
  }

  interface OSCMessage {
    address: string;
    args: OSCArgument[];
  }

  interface ReadOptions {
    metadata?: boolean;
  }

  /** Write an OSC message to a byte array */
  function writeMessage(msg: OSCMessage): Uint8Array;

  /** Read an OSC message from a Buffer */
  function readMessage(data: Buffer | Uint8Array, options?: ReadOptions): OSCMessage;

  export { OSCArgument, OSCMessage, ReadOptions, writeMessage, readMessage };
}
