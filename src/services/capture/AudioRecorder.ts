export interface CaptureOptions {
  /** Device name in the syntax of the recorder's input format. */
  inputDevice: string;
  frameDurationMs: number;
  onFrame: (frame: Buffer) => void;
  /** Capture died while streaming; the session cannot continue. */
  onError: (error: Error) => void;
}

export interface AudioRecorder {
  isRecording(): boolean;
  startStreaming(options: CaptureOptions): Promise<void>;
  stop(): Promise<void>;
}
