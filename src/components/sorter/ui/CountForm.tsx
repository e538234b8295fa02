import { Button } from "@/components/ui/button";
import { Input } from "@/components/ui/input";
import { Label } from "@/components/ui/label";
import { useForm } from "react-hook-form";

type CountFormValues = {
  count: string;
};

type CountFormProps = {
  onSubmit: (raw: string) => void;
};

// Validation happens in the caller, which owns the error dialog.
export function CountForm({ onSubmit }: CountFormProps) {
  const form = useForm<CountFormValues>({
    defaultValues: { count: "" },
  });

  return (
    <form className="space-y-3" onSubmit={form.handleSubmit((values) => onSubmit(values.count))}>
      <Label htmlFor="count-input">How many numbers to display?</Label>
      <Input id="count-input" inputMode="numeric" autoComplete="off" autoFocus {...form.register("count")} />
      <Button type="submit" className="w-full">
        Enter
      </Button>
    </form>
  );
}
