import { parseFrameRate, parseIndexFrameRows, parseProbeOutput } from '../src/media/ffmpeg.js';
import { analysisSize, buildDecodeArgs } from '../src/media/frame-source.js';
import { SourceError } from '../src/utils/errors.js';

describe('parseFrameRate', () => {
  it('parses rationals and decimals', () => {
    expect(parseFrameRate('30/1')).toBe(30);
    expect(parseFrameRate('30000/1001')).toBeCloseTo(29.97, 2);
    expect(parseFrameRate('25')).toBe(25);
  });

  it('returns null for missing or degenerate rates', () => {
    expect(parseFrameRate(undefined)).toBeNull();
    expect(parseFrameRate('0/0')).toBeNull();
    expect(parseFrameRate('0/1')).toBeNull();
    expect(parseFrameRate('abc')).toBeNull();
  });
});

describe('parseProbeOutput', () => {
  const probe = (streams: unknown[], format: Record<string, string> = { duration: '12.5', format_name: 'mov,mp4' }) =>
    JSON.stringify({ streams, format });

  it('takes the first video stream', () => {
    const info = parseProbeOutput(
      probe([
        { codec_type: 'audio', codec_name: 'aac' },
        { codec_type: 'video', codec_name: 'h264', width: 1280, height: 720, r_frame_rate: '24/1' },
      ]),
      'clip.mp4',
    );
    expect(info).toEqual({
      durationS: 12.5,
      formatName: 'mov,mp4',
      width: 1280,
      height: 720,
      fps: 24,
      videoCodec: 'h264',
    });
  });

  it('falls back to avg_frame_rate, then to 30 fps', () => {
    const avg = parseProbeOutput(
      probe([{ codec_type: 'video', width: 2, height: 2, r_frame_rate: '0/0', avg_frame_rate: '15/1' }]),
      'a',
    );
    expect(avg.fps).toBe(15);

    const none = parseProbeOutput(probe([{ codec_type: 'video', width: 2, height: 2 }]), 'b');
    expect(none.fps).toBe(30);
    expect(none.videoCodec).toBeNull();
  });

  it('treats a missing duration as 0', () => {
    const info = parseProbeOutput(probe([{ codec_type: 'video', width: 2, height: 2 }], {}), 'c');
    expect(info.durationS).toBe(0);
    expect(info.formatName).toBe('');
  });

  it('rejects audio-only input', () => {
    expect(() => parseProbeOutput(probe([{ codec_type: 'audio' }]), 'song.mp3')).toThrow(
      new SourceError('No decodable video stream in song.mp3'),
    );
  });

  it('rejects output that is not JSON', () => {
    expect(() => parseProbeOutput('Invalid data found', 'junk.bin')).toThrow(SourceError);
  });
});

describe('parseIndexFrameRows', () => {
  it('keeps intra-coded rows in increasing time order', () => {
    const csv = ['0.000000,I', '0.033367,P', '2.002000,I', 'N/A,I', '2.002000,I', '1.500000,I', '4.004000,I', ''].join('\n');
    expect(parseIndexFrameRows(csv, 30)).toEqual([
      { frameIndex: 0, timestampS: 0 },
      { frameIndex: 60, timestampS: 2.002 },
      { frameIndex: 120, timestampS: 4.004 },
    ]);
  });

  it('returns an empty list when nothing is intra-coded', () => {
    expect(parseIndexFrameRows('0.5,P\n1.0,B\n', 30)).toEqual([]);
  });
});

describe('analysisSize', () => {
  it('downscales to the analysis width, keeping even dimensions', () => {
    expect(analysisSize({ width: 1920, height: 1080 }, 320)).toEqual({ width: 320, height: 180 });
    expect(analysisSize({ width: 1080, height: 1920 }, 320)).toEqual({ width: 320, height: 568 });
  });

  it('never upscales', () => {
    expect(analysisSize({ width: 100, height: 50 }, 320)).toEqual({ width: 100, height: 50 });
  });
});

describe('buildDecodeArgs', () => {
  it('decodes every frame when step is 1', () => {
    const args = buildDecodeArgs('in.mp4', { width: 320, height: 180 }, 1);
    expect(args[args.indexOf('-vf') + 1]).toBe('scale=320:180');
    expect(args.slice(-5)).toEqual(['-f', 'rawvideo', '-pix_fmt', 'rgb24', 'pipe:1']);
  });

  it('samples every n-th frame before scaling', () => {
    const args = buildDecodeArgs('in.mp4', { width: 320, height: 180 }, 2);
    expect(args[args.indexOf('-vf') + 1]).toBe('select=not(mod(n\\,2)),scale=320:180');
  });
});
