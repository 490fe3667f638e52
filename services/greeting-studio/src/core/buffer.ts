function isWebReadableStream(value: unknown): value is ReadableStream<Uint8Array> {
  return typeof value === 'object' && value !== null && 'getReader' in value;
}

function hasArrayBuffer(value: unknown): value is { arrayBuffer(): Promise<ArrayBuffer> } {
  return typeof value === 'object' && value !== null && 'arrayBuffer' in value && typeof value.arrayBuffer === 'function';
}

async function webStreamToBuffer(stream: ReadableStream<Uint8Array>): Promise<Buffer> {
  const reader = stream.getReader();
  const chunks: Buffer[] = [];
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    if (value) chunks.push(Buffer.from(value));
  }
  return Buffer.concat(chunks);
}

/** OpenAI answers speech with a fetch Response, ElevenLabs with a web stream. */
export async function audioLikeToBuffer(audio: unknown): Promise<Buffer> {
  if (hasArrayBuffer(audio)) return Buffer.from(await audio.arrayBuffer());
  if (isWebReadableStream(audio)) return webStreamToBuffer(audio);

  throw new Error('Unsupported audio response type from speech provider');
}
