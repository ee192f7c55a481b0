import {injectable} from 'tsyringe';
import type {TranscriptPort} from '../../../application/port/out/TranscriptPort';

/**
 * トランスクリプトを標準出力に書き出すアダプター
 */
@injectable()
export class ConsoleTranscriptAdapter implements TranscriptPort {
    write(line: string): void {
        console.log(line);
    }
}
