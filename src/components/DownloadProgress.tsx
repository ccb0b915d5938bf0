import { Box, Text, useInput } from 'ink';
import Spinner from 'ink-spinner';
import {
  useDownloadProgress,
  downloadProgressStore,
  type DownloadProgressStore,
} from '../stores/downloadProgressStore.js';

interface DownloadProgressProps {
  onCancel: () => void;
  store?: DownloadProgressStore;
}

export function DownloadProgress({
  onCancel,
  store = downloadProgressStore,
}: DownloadProgressProps) {
  const phase = useDownloadProgress((s) => s.phase, store);
  const message = useDownloadProgress((s) => s.message, store);
  const imageIndex = useDownloadProgress((s) => s.imageIndex, store);
  const totalImages = useDownloadProgress((s) => s.totalImages, store);

  useInput((input, key) => {
    if (input === 'c' || key.escape) {
      onCancel();
    }
  });

  if (phase === 'idle') return null;

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
      <Box>
        <Text color="cyan">
          <Spinner type="dots" />
        </Text>
        <Text> {phase}</Text>
        {phase === 'downloading' && totalImages > 0 ? (
          <Text dimColor>
            {' '}
            ({imageIndex}/{totalImages})
          </Text>
        ) : null}
      </Box>
      <Box marginTop={1}>
        <Text>{message}</Text>
      </Box>
      <Box marginTop={1}>
        <Text dimColor>{'c/esc cancel'}</Text>
      </Box>
    </Box>
  );
}
