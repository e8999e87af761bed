import type { RecognitionRequest, RecognitionResult, SttProvider } from '../types';

export class DisabledSttProvider implements SttProvider {
  public readonly id = 'disabled';

  public async recognize(_request: RecognitionRequest): Promise<RecognitionResult> {
    return { text: '', confidence: 0 };
  }
}
