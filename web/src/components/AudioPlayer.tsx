import { useRef } from 'react';
import { useLoopController } from '../hooks/useLoopController';
import { useLoopKeyboardShortcuts } from '../hooks/useLoopKeyboardShortcuts';
import { formatFileSize } from '../utils/mediaFormatters';
import { LoopControls } from './LoopControls';

export interface AudioSource {
  url: string;
  byteLength: number;
  segmentCount: number;
}

interface AudioPlayerProps {
  audio: AudioSource | null;
  downloadName: string;
  onDownload: () => void;
}

export default function AudioPlayer({ audio, downloadName, onDownload }: AudioPlayerProps) {
  const elementRef = useRef<HTMLAudioElement | null>(null);
  const loop = useLoopController(elementRef, audio?.url ?? null);

  useLoopKeyboardShortcuts({
    handlers: {
      onMarkPointA: loop.markPointA,
      onMarkPointB: loop.markPointB,
      onToggleLoop: loop.toggleLoop,
    },
    enabled: audio !== null,
  });

  if (!audio) {
    return (
      <div className="audio-player" role="status">
        Generate audio to listen and download.
      </div>
    );
  }

  const sizeLabel = formatFileSize(audio.byteLength);

  return (
    <div className="audio-player">
      <audio
        key={audio.url}
        ref={elementRef}
        className="audio-player__element"
        data-testid="audio-player"
        controls
        src={audio.url}
      >
        Your browser does not support the audio element.
      </audio>
      <div className="audio-player__meta">
        {sizeLabel ? <span>{sizeLabel}</span> : null}
        <span>
          {audio.segmentCount} {audio.segmentCount === 1 ? 'segment' : 'segments'}
        </span>
      </div>
      <button type="button" className="studio-button" onClick={onDownload}>
        Download {downloadName}
      </button>
      <LoopControls
        state={loop.state}
        warning={loop.warning}
        onMarkPointA={loop.markPointA}
        onMarkPointB={loop.markPointB}
        onToggleLoop={loop.toggleLoop}
        onClear={loop.clearLoop}
        onRepeatCountChange={loop.setRepeatCount}
      />
    </div>
  );
}
