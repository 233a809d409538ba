import { Box, Text } from "ink";
import type React from "react";
import type { ModalState } from "../state/modal-reducer";

/**
 * Renders the open modal. Keys reach it through the input router; the
 * fields only show what the modal reducer holds.
 */
export const Modal: React.FC<{ modal: ModalState }> = ({ modal }) => {
  if (modal.kind === "confirm") {
    return (
      <Box flexDirection="column" borderStyle="round" borderColor="yellow" paddingX={2}>
        <Text bold color="yellow">
          {modal.title}
        </Text>
        <Text>{modal.message}</Text>
        <Text dimColor>
          <Text color="cyan">y/enter</Text> confirm • <Text color="cyan">n/esc</Text> cancel
        </Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={2}>
      <Text bold color="cyan">
        {modal.title}
      </Text>
      {modal.fields.map((field, i) => (
        <Box key={field.label}>
          <Box width={14}>
            <Text bold={i === modal.focus}>
              {i === modal.focus ? "› " : "  "}
              {field.label}
              {field.optional ? "" : "*"}
            </Text>
          </Box>
          <Text>{field.value}</Text>
          {i === modal.focus && <Text inverse> </Text>}
        </Box>
      ))}
      {modal.error && <Text color="red">{modal.error}</Text>}
      <Text dimColor>
        <Text color="cyan">tab</Text> next field • <Text color="cyan">enter</Text> submit • <Text color="cyan">esc</Text> cancel
      </Text>
    </Box>
  );
};
