import { Skeleton } from "@/components/ui/skeleton";

export default function HomeLoading() {
  return (
    <div className="space-y-6">
      <div>
        <Skeleton className="h-8 w-96" />
        <Skeleton className="mt-2 h-5 w-[32rem]" />
      </div>
      <Skeleton className="h-48" />
    </div>
  );
}
