import { useId } from 'react';

type Props = {
  outputName: string;
  onOutputNameChange: (name: string) => void;
  onPreview: () => void;
  isPreviewing: boolean;
  previewUrl: string | null;
};

export function PreviewExportPanel({
  outputName,
  onOutputNameChange,
  onPreview,
  isPreviewing,
  previewUrl,
}: Props) {
  const autoId = useId();
  const nameId = `output-name-${autoId}`;

  return (
    <section className="studio-panel studio-panel--export" aria-label="Preview and export">
      <h2 className="studio-panel__title">Preview &amp; Export</h2>
      <button type="button" className="studio-button" onClick={onPreview} disabled={isPreviewing}>
        {isPreviewing ? 'Preparing preview…' : 'Preview sample'}
      </button>
      {previewUrl ? (
        <audio
          key={previewUrl}
          className="studio-preview__element"
          data-testid="preview-player"
          src={previewUrl}
          autoPlay
          controls
        >
          Your browser does not support the audio element.
        </audio>
      ) : null}

      <label htmlFor={nameId}>Output file name</label>
      <div className="studio-export__name">
        <input
          id={nameId}
          type="text"
          value={outputName}
          onChange={(event) => onOutputNameChange(event.target.value)}
        />
        <span aria-hidden="true">.mp3</span>
      </div>
    </section>
  );
}
