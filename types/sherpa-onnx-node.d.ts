// sherpa-onnx-node ships no type declarations; this covers the offline recognizer API used here.
declare module "sherpa-onnx-node" {
  interface OfflineRecognizerConfig {
    modelConfig: {
      whisper: { encoder: string; decoder: string };
      tokens: string;
      numThreads?: number;
    };
  }

  interface OfflineStream {
    acceptWaveform(wave: { sampleRate: number; samples: Float32Array }): void;
  }

  class OfflineRecognizer {
    constructor(config: OfflineRecognizerConfig);
    createStream(): OfflineStream;
    decode(stream: OfflineStream): void;
    getResult(stream: OfflineStream): { text: string };
  }

  const sherpa: { OfflineRecognizer: typeof OfflineRecognizer };
  export default sherpa;
}
