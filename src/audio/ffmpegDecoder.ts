import { spawn } from 'child_process';
import { log } from '../log';
import { decodeWav, type DecodedAudio } from './wavCodec';

/** Decodes compressed containers that have no in-process decoder. */
export interface ExternalAudioDecoder {
  decode(bytes: Buffer, mime: string): Promise<DecodedAudio>;
}

export interface FfmpegDecoderOptions {
  ffmpegPath: string;
  timeoutMs: number;
}

export class FfmpegDecoder implements ExternalAudioDecoder {
  constructor(private readonly options: FfmpegDecoderOptions) {}

  public decode(bytes: Buffer, mime: string): Promise<DecodedAudio> {
    // Native rate and channel layout are kept so downmix/resample stay in-process.
    const args = [
      '-hide_banner',
      '-loglevel',
      'error',
      '-i',
      'pipe:0',
      '-vn',
      '-f',
      'wav',
      '-acodec',
      'pcm_f32le',
      'pipe:1',
    ];

    return new Promise<DecodedAudio>((resolve, reject) => {
      const child = spawn(this.options.ffmpegPath, args, { stdio: ['pipe', 'pipe', 'pipe'] });
      const out: Buffer[] = [];
      const err: Buffer[] = [];
      let timedOut = false;

      const timeout = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, this.options.timeoutMs);

      child.stdout.on('data', (d) => out.push(Buffer.isBuffer(d) ? d : Buffer.from(d)));
      child.stderr.on('data', (d) => err.push(Buffer.isBuffer(d) ? d : Buffer.from(d)));
      // EPIPE when ffmpeg exits before consuming the input; the close handler reports it.
      child.stdin.on('error', (error) => {
        log.debug({ event: 'ffmpeg_stdin_error', err: error.message }, 'ffmpeg stdin error');
      });

      child.on('error', (error) => {
        clearTimeout(timeout);
        log.warn({ event: 'ffmpeg_spawn_failed', err: error.message, mime }, 'ffmpeg spawn failed');
        reject(new Error(`ffmpeg_spawn_failed: ${error.message}`));
      });

      child.on('close', (code) => {
        clearTimeout(timeout);
        if (timedOut) {
          reject(new Error(`ffmpeg_decode_timeout len=${bytes.length}`));
          return;
        }
        if (code !== 0) {
          const stderr = Buffer.concat(err).toString('utf8').slice(0, 200);
          reject(new Error(`ffmpeg_decode_failed code=${code} stderr=${stderr}`));
          return;
        }
        try {
          resolve(decodeWav(Buffer.concat(out)));
        } catch (error) {
          reject(error);
        }
      });

      child.stdin.end(bytes);
    });
  }
}
