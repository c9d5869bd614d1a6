import { useCallback } from 'react';
import AudioPlayer from './components/AudioPlayer';
import { ErrorBoundary } from './components/ErrorBoundary';
import { PreviewExportPanel } from './components/PreviewExportPanel';
import { StudioInputPanel } from './components/StudioInputPanel';
import { useStudioStore } from './stores/studioStore';
import type { StudioStore } from './stores/studioStore';
import { buildOutputFilename, downloadBlob } from './utils/downloads';

type AppProps = {
  store?: StudioStore;
};

export default function App({ store = useStudioStore }: AppProps) {
  const state = store();
  const { artifact, outputName, generate, previewSample } = state;
  const downloadName = buildOutputFilename(outputName, artifact?.createdAt);

  const handleGenerate = useCallback(() => {
    void generate();
  }, [generate]);

  const handlePreview = useCallback(() => {
    void previewSample();
  }, [previewSample]);

  const handleDownload = useCallback(() => {
    if (artifact) {
      downloadBlob(artifact.blob, downloadName);
    }
  }, [artifact, downloadName]);

  return (
    <div className="studio">
      <header className="studio__header">
        <h1>Diary Voice Studio</h1>
        <p className="studio__caption">
          Paste text, optionally translate it, choose a voice and tone, then generate, listen and download.
        </p>
      </header>

      <ErrorBoundary>
        <main className="studio__layout">
          <StudioInputPanel
            text={state.text}
            translateEnabled={state.translateEnabled}
            translationAvailable={state.translationAvailable}
            voiceLabel={state.voiceLabel}
            customVoice={state.customVoice}
            rate={state.rate}
            pitch={state.pitch}
            status={state.status}
            progress={state.progress}
            onTextChange={state.setText}
            onTranslateChange={state.setTranslateEnabled}
            onVoiceLabelChange={state.setVoiceLabel}
            onCustomVoiceChange={state.setCustomVoice}
            onRateChange={state.setRate}
            onPitchChange={state.setPitch}
            onGenerate={handleGenerate}
          />
          <PreviewExportPanel
            outputName={outputName}
            onOutputNameChange={state.setOutputName}
            onPreview={handlePreview}
            isPreviewing={state.isPreviewing}
            previewUrl={state.previewUrl}
          />
        </main>

        {state.warning ? (
          <div className="studio__notice studio__notice--warning" role="alert">
            {state.warning}
          </div>
        ) : null}
        {state.error ? (
          <div className="studio__notice studio__notice--error" role="alert">
            {state.error}
            <button type="button" className="studio-button" onClick={state.dismissMessages}>
              Dismiss
            </button>
          </div>
        ) : null}
        {state.status === 'success' ? (
          <div className="studio__notice studio__notice--success" role="status">
            Done!
          </div>
        ) : null}

        <section className="studio-panel studio-panel--player" aria-label="Player">
          <AudioPlayer audio={artifact} downloadName={downloadName} onDownload={handleDownload} />
        </section>
      </ErrorBoundary>
    </div>
  );
}
