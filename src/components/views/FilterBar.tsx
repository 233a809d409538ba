import { Box, Text } from "ink";
import type React from "react";
import type { ListState } from "../../state/list-reducer";

/** Shows the filter being typed, or the one in effect. */
export const FilterBar: React.FC<{ list: ListState | null }> = ({ list }) => {
  if (!list || (!list.filtering && !list.filter)) return null;

  return (
    <Box>
      <Text color="cyan" bold>
        /{" "}
      </Text>
      <Text>{list.filter}</Text>
      {list.filtering && <Text inverse> </Text>}
      {list.filtering ? (
        <Text dimColor> enter keep • esc clear</Text>
      ) : (
        <Text dimColor> (filtered)</Text>
      )}
    </Box>
  );
};
